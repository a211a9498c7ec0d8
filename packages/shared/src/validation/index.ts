/**
 * Validation Module
 *
 * Deterministic checks over extracted field records.
 */

export {
  DocumentValidator,
  validateRecord,
  requiredFieldsFor,
  orderForReview,
  allPassed,
  outcome,
  type ValidatorOptions,
} from './validator';

export { ConsistencyChecker, datesMatch } from './consistency';

export {
  ExactTokenSetMatcher,
  ModelAssistedMatcher,
  createNameMatcher,
  normalizeNameTokens,
  tokenSetsMatch,
  type NameMatcher,
} from './name-matchers';

export {
  CONSISTENCY_DATE_FORMATS,
  parseDateWithFormat,
  parseFlexibleDate,
  parseIsoDate,
  formatIsoDate,
  sameCalendarDate,
  isValidCalendarDate,
  ageInCalendarYears,
  ageInDays365,
  utcCalendarDate,
  type CalendarDate,
  type DateFormat,
} from './dates';
