/**
 * Cross-document Consistency
 *
 * Checks that a passport and a driver's license describe the same person:
 * always exactly two outcomes, consistency:name then consistency:dob.
 */

import type { PartialFieldRecord, ValidationOutcome } from '../types';
import { parseFlexibleDate, sameCalendarDate } from './dates';
import { ExactTokenSetMatcher, type NameMatcher } from './name-matchers';
import { outcome } from './validator';

/**
 * Both dates readable (see CONSISTENCY_DATE_FORMATS for precedence) and equal.
 */
export function datesMatch(a: string | null | undefined, b: string | null | undefined): boolean {
  const left = parseFlexibleDate(a);
  const right = parseFlexibleDate(b);
  return left !== null && right !== null && sameCalendarDate(left, right);
}

export class ConsistencyChecker {
  constructor(private readonly nameMatcher: NameMatcher = new ExactTokenSetMatcher()) {}

  async check(
    passport: PartialFieldRecord,
    driversLicense: PartialFieldRecord
  ): Promise<ValidationOutcome[]> {
    const namesMatch = await this.nameMatcher.matches(passport.name, driversLicense.name);

    return [
      outcome('consistency:name', namesMatch ? 'pass' : 'fail'),
      outcome('consistency:dob', datesMatch(passport.dob, driversLicense.dob) ? 'pass' : 'fail'),
    ];
  }
}
