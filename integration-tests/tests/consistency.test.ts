/**
 * Cross-document consistency and name matching tests
 */

import {
  ConsistencyChecker,
  ExactTokenSetMatcher,
  ModelAssistedMatcher,
  createNameMatcher,
  datesMatch,
  normalizeNameTokens,
  tokenSetsMatch,
} from '@idverify/shared';
import { StubGateway, absorbedCount } from './helpers';

describe('normalizeNameTokens', () => {
  it('should fold diacritics, case and punctuation', () => {
    expect(normalizeNameTokens('José  DOE-Smith')).toEqual(['jose', 'doe', 'smith']);
  });

  it('should return no tokens for a missing name', () => {
    expect(normalizeNameTokens(null)).toEqual([]);
    expect(normalizeNameTokens('')).toEqual([]);
  });
});

describe('tokenSetsMatch', () => {
  it('should ignore token order', () => {
    expect(tokenSetsMatch('JOHN Q DOE', 'DOE JOHN Q')).toBe(true);
  });

  it('should ignore diacritics', () => {
    expect(tokenSetsMatch('José Müller', 'JOSE MULLER')).toBe(true);
  });

  it('should ignore repeated tokens', () => {
    expect(tokenSetsMatch('John John Doe', 'Doe John')).toBe(true);
  });

  it('should not match when one name has an extra token', () => {
    expect(tokenSetsMatch('John Doe', 'John Doe Jr')).toBe(false);
  });

  it('should never match two empty names', () => {
    expect(tokenSetsMatch(null, null)).toBe(false);
    expect(tokenSetsMatch('', '  ')).toBe(false);
  });
});

describe('datesMatch', () => {
  it('should read slash dates month-first', () => {
    expect(datesMatch('1990-03-04', '03/04/1990')).toBe(true);
    expect(datesMatch('03/04/1990', '04/03/1990')).toBe(false);
  });

  it('should match across dash formats', () => {
    expect(datesMatch('1990-03-04', '04-03-1990')).toBe(true);
  });

  it('should not match when either date is unreadable', () => {
    expect(datesMatch('1990-03-04', null)).toBe(false);
    expect(datesMatch('unknown', 'unknown')).toBe(false);
  });
});

describe('ConsistencyChecker', () => {
  const checker = new ConsistencyChecker(new ExactTokenSetMatcher());

  it('should pass the same person written differently', async () => {
    const outcomes = await checker.check(
      { name: 'JOHN Q DOE', dob: '1990-03-04' },
      { name: 'DOE JOHN Q', dob: '03/04/1990' }
    );

    expect(outcomes).toEqual([
      { name: 'consistency:name', status: 'pass' },
      { name: 'consistency:dob', status: 'pass' },
    ]);
  });

  it('should fail swapped day and month', async () => {
    const outcomes = await checker.check(
      { name: 'JOHN DOE', dob: '03/04/1990' },
      { name: 'JOHN DOE', dob: '04/03/1990' }
    );

    expect(outcomes).toEqual([
      { name: 'consistency:name', status: 'pass' },
      { name: 'consistency:dob', status: 'fail' },
    ]);
  });

  it('should fail both checks for empty records', async () => {
    const outcomes = await checker.check({}, {});

    expect(outcomes).toEqual([
      { name: 'consistency:name', status: 'fail' },
      { name: 'consistency:dob', status: 'fail' },
    ]);
  });
});

describe('ModelAssistedMatcher', () => {
  it('should not call the model when the rule already matches', async () => {
    const gateway = new StubGateway({ complete: '{"same_person": false}' });
    const matcher = new ModelAssistedMatcher(gateway);

    expect(await matcher.matches('JOHN DOE', 'Doe John')).toBe(true);
    expect(gateway.calls).toHaveLength(0);
  });

  it('should accept the model verdict when the rule fails', async () => {
    const gateway = new StubGateway({ complete: '```json\n{"same_person": true}\n```' });
    const matcher = new ModelAssistedMatcher(gateway);

    expect(await matcher.matches('Jon Doe', 'John Doe')).toBe(true);

    const [call] = gateway.callsOf('complete');
    expect(call.prompt).toContain('Passport name: Jon Doe');
    expect(call.prompt).toContain('License name: John Doe');
  });

  it('should keep the rule result when the reply is malformed', async () => {
    const gateway = new StubGateway({ complete: '{"same_person": "probably"}' });
    const matcher = new ModelAssistedMatcher(gateway);
    const before = await absorbedCount('name_matching', 'malformed_response');

    expect(await matcher.matches('Jon Doe', 'John Doe')).toBe(false);
    expect(await absorbedCount('name_matching', 'malformed_response')).toBe(before + 1);
  });

  it('should keep the rule result when the gateway fails', async () => {
    const gateway = new StubGateway({ complete: new Error('connection reset') });
    const matcher = new ModelAssistedMatcher(gateway);

    expect(await matcher.matches('Jon Doe', 'John Doe')).toBe(false);
  });

  it('should not ask about a missing name', async () => {
    const gateway = new StubGateway({ complete: '{"same_person": true}' });
    const matcher = new ModelAssistedMatcher(gateway);

    expect(await matcher.matches('John Doe', null)).toBe(false);
    expect(gateway.calls).toHaveLength(0);
  });

  it('should drive the consistency name check', async () => {
    const gateway = new StubGateway({ complete: '{"same_person": true}' });
    const checker = new ConsistencyChecker(createNameMatcher('model_assisted', gateway));

    const outcomes = await checker.check(
      { name: 'Jon Doe', dob: '1990-03-04' },
      { name: 'John Doe', dob: '1990-03-04' }
    );

    expect(outcomes[0]).toEqual({ name: 'consistency:name', status: 'pass' });
  });
});

describe('createNameMatcher', () => {
  it('should build the matcher for each kind', () => {
    const gateway = new StubGateway();

    expect(createNameMatcher('exact', gateway).kind).toBe('exact');
    expect(createNameMatcher('model_assisted', gateway).kind).toBe('model_assisted');
  });
});
