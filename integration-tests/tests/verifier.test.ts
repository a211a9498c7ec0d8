/**
 * Document verifier tests
 */

import {
  DocumentVerifier,
  PassportExtractor,
  loadConfig,
  registerAllExtractors,
  registerExtractor,
  type DocumentImage,
  type JsonObject,
  type PassportRecord,
} from '@idverify/shared';
import {
  StubGateway,
  LICENSE_REPLY,
  PASSPORT_REPLY,
  SAMPLE_LICENSE,
  SAMPLE_PASSPORT,
  fixedClock,
  sampleImage,
  sleep,
} from './helpers';

/** Passport prompt names the document; the license prompt does not */
function replyByPrompt(prompt: string): string {
  return prompt.includes('Passport') ? PASSPORT_REPLY : LICENSE_REPLY;
}

function createVerifier(gateway: StubGateway): DocumentVerifier {
  return new DocumentVerifier({
    gateway,
    validator: { now: fixedClock, minimumAge: 18, ageComputation: 'calendar' },
  });
}

describe('DocumentVerifier.verifyDocument', () => {
  it('should build a passing report for a complete passport', async () => {
    const verifier = createVerifier(new StubGateway({ infer: PASSPORT_REPLY }));

    const report = await verifier.verifyDocument(sampleImage(), 'passport', { caseId: 'case-1' });

    expect(report.doc_id).toBe('case-1');
    expect(report.doc_type).toBe('passport');
    expect(report.model).toBe('stub-vision');
    expect(report.score).toBe(0);
    expect(report.validators).toHaveLength(7);
    expect(report.final_status).toBe('pass');
    expect(report.extracted.id_number).toBe('X1234567');
  });

  it('should generate a document id when no case id is given', async () => {
    const verifier = createVerifier(new StubGateway({ infer: PASSPORT_REPLY }));

    const report = await verifier.verifyDocument(sampleImage(), 'passport');

    expect(report.doc_id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('should report an unreadable reply as failed checks', async () => {
    const verifier = createVerifier(new StubGateway({ infer: 'garbage' }));

    const report = await verifier.verifyDocument(sampleImage(), 'passport', { caseId: 'case-2' });

    expect(report.extracted).toEqual({
      name: null,
      dob: null,
      expiry_date: null,
      id_number: null,
      issuing_country: null,
    });
    expect(report.validators).toEqual([
      { name: 'required:name', status: 'fail' },
      { name: 'required:dob', status: 'fail' },
      { name: 'required:expiry_date', status: 'fail' },
      { name: 'required:id_number', status: 'fail' },
      { name: 'required:issuing_country', status: 'fail' },
      { name: 'expiry_future', status: 'warn' },
      { name: 'age_check', status: 'warn' },
    ]);
    expect(report.final_status).toBe('fail');
  });

  it('should fail the report when only a warning is raised', async () => {
    const reply = JSON.stringify({ ...SAMPLE_PASSPORT, dob: '04/03/1990' });
    const verifier = createVerifier(new StubGateway({ infer: reply }));

    const report = await verifier.verifyDocument(sampleImage(), 'passport', { caseId: 'case-3' });

    expect(report.validators.find((item) => item.name === 'age_check')?.status).toBe('warn');
    expect(report.final_status).toBe('fail');
  });

  it('should use the requested extraction strategy', async () => {
    const gateway = new StubGateway({ transcribe: 'PASSPORT', infer: PASSPORT_REPLY });
    const verifier = createVerifier(gateway);

    await verifier.verifyDocument(sampleImage(), 'passport', { strategy: 'ocr_assisted' });

    expect(gateway.calls.map((call) => call.operation)).toEqual(['transcribe', 'infer']);
  });
});

describe('DocumentVerifier.verifyPair', () => {
  it('should order validators passport, license, consistency', async () => {
    const verifier = createVerifier(new StubGateway({ infer: replyByPrompt }));

    const report = await verifier.verifyPair(sampleImage(), sampleImage(), { caseId: 'pair-1' });

    expect(report.doc_type).toBe('both');
    expect(report.validators.map((item) => item.name)).toEqual([
      'required:name',
      'required:dob',
      'required:expiry_date',
      'required:id_number',
      'required:issuing_country',
      'expiry_future',
      'age_check',
      'required:name',
      'required:dob',
      'required:expiry_date',
      'required:id_number',
      'required:issuing_state',
      'required:address',
      'expiry_future',
      'age_check',
      'consistency:name',
      'consistency:dob',
    ]);
    expect(report.extracted.passport.issuing_country).toBe('USA');
    expect(report.extracted.drivers_license.issuing_state).toBe('CA');
  });

  it('should warn on the license dob but still match it across documents', async () => {
    const verifier = createVerifier(new StubGateway({ infer: replyByPrompt }));

    const report = await verifier.verifyPair(sampleImage(), sampleImage(), { caseId: 'pair-2' });

    // License dob is 03/04/1990: ambiguous for age_check, March 4 for consistency
    expect(report.validators[14]).toEqual({ name: 'age_check', status: 'warn' });
    expect(report.validators.slice(-2)).toEqual([
      { name: 'consistency:name', status: 'pass' },
      { name: 'consistency:dob', status: 'pass' },
    ]);
    expect(report.final_status).toBe('fail');
  });

  it('should pass when every check passes', async () => {
    const license = JSON.stringify({ ...SAMPLE_LICENSE, dob: '1990-03-04' });
    const gateway = new StubGateway({
      infer: (prompt) => (prompt.includes('Passport') ? PASSPORT_REPLY : license),
    });
    const verifier = createVerifier(gateway);

    const report = await verifier.verifyPair(sampleImage(), sampleImage());

    expect(report.validators.every((item) => item.status === 'pass')).toBe(true);
    expect(report.final_status).toBe('pass');
  });

  it('should use the extractor registered for each document type', async () => {
    class RedactingPassportExtractor extends PassportExtractor {
      toRecord(raw: JsonObject): PassportRecord {
        return Object.freeze({ ...super.toRecord(raw), id_number: 'REDACTED' });
      }
    }
    registerExtractor(new RedactingPassportExtractor());

    try {
      const verifier = createVerifier(new StubGateway({ infer: replyByPrompt }));

      const report = await verifier.verifyPair(sampleImage(), sampleImage());

      expect(report.extracted.passport.id_number).toBe('REDACTED');
      expect(report.extracted.drivers_license.id_number).toBe('D7654321');
    } finally {
      registerAllExtractors();
    }
  });

  it('should run both extractions at the same time', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const gateway = new StubGateway();
    gateway.infer = async (image: DocumentImage, prompt: string) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(10);
      inFlight -= 1;
      return replyByPrompt(prompt);
    };

    await createVerifier(gateway).verifyPair(sampleImage(), sampleImage());

    expect(maxInFlight).toBe(2);
  });
});

describe('DocumentVerifier.fromConfig', () => {
  it('should use the model-assisted matcher when configured', async () => {
    const gateway = new StubGateway({ complete: '{"same_person": true}' });
    const verifier = DocumentVerifier.fromConfig(gateway, loadConfig({ NAME_MATCHER: 'model_assisted' }));

    const outcomes = await verifier.checkConsistency(
      { name: 'Jon Doe', dob: '1990-03-04' },
      { name: 'John Doe', dob: '1990-03-04' }
    );

    expect(outcomes).toEqual([
      { name: 'consistency:name', status: 'pass' },
      { name: 'consistency:dob', status: 'pass' },
    ]);
    expect(gateway.callsOf('complete')).toHaveLength(1);
  });

  it('should use exact matching by default', async () => {
    const gateway = new StubGateway({ complete: '{"same_person": true}' });
    const verifier = DocumentVerifier.fromConfig(gateway, loadConfig({}));

    const outcomes = await verifier.checkConsistency({ name: 'Jon Doe' }, { name: 'John Doe' });

    expect(outcomes[0]).toEqual({ name: 'consistency:name', status: 'fail' });
    expect(gateway.calls).toHaveLength(0);
  });

  it('should use the configured extraction strategy', async () => {
    const gateway = new StubGateway({ transcribe: 'PASSPORT', infer: PASSPORT_REPLY });
    const verifier = DocumentVerifier.fromConfig(gateway, loadConfig({ EXTRACTION_STRATEGY: 'ocr_assisted' }));

    await verifier.extract(sampleImage(), 'passport');

    expect(gateway.callsOf('transcribe')).toHaveLength(1);
  });
});
