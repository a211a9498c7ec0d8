/**
 * Authenticity assessment tests
 */

import {
  DRIVERS_LICENSE_AUTHENTICITY_TEMPLATE,
  PASSPORT_AUTHENTICITY_TEMPLATE,
  assessAuthenticity,
  checkVerdict,
  isEmptyVerdict,
  isFlaggedAsFraud,
  readVerdict,
} from '@idverify/shared';
import { StubGateway, absorbedCount, sampleImage } from './helpers';

const SUSPICIOUS_REPLY = JSON.stringify({
  is_suspected_fraud: true,
  confidence: 0.92,
  explanation: 'Photo edges show cut-and-paste artifacts',
});

describe('authenticity prompts', () => {
  it('should ask about the MRZ for passports and the barcode for licenses', () => {
    expect(PASSPORT_AUTHENTICITY_TEMPLATE.prompt).toContain('MRZ');
    expect(DRIVERS_LICENSE_AUTHENTICITY_TEMPLATE.prompt).toContain('PDF417');
  });
});

describe('checkVerdict', () => {
  it('should accept a complete verdict', () => {
    expect(checkVerdict({ is_suspected_fraud: false, confidence: 0, explanation: '' }).valid).toBe(true);
  });

  it('should reject confidence outside 0-1', () => {
    expect(checkVerdict({ is_suspected_fraud: false, confidence: 1.5, explanation: 'ok' }).valid).toBe(false);
  });

  it('should reject a missing field', () => {
    expect(checkVerdict({ is_suspected_fraud: false, confidence: 0.5 }).valid).toBe(false);
  });
});

describe('readVerdict', () => {
  it('should drop keys outside the verdict', () => {
    const result = readVerdict(
      '{"is_suspected_fraud": false, "confidence": 0.8, "explanation": "Looks genuine", "notes": "x"}'
    );

    expect(result).toEqual({
      ok: true,
      value: { is_suspected_fraud: false, confidence: 0.8, explanation: 'Looks genuine' },
    });
  });
});

describe('assessAuthenticity', () => {
  it('should return the verdict and send the document-specific prompt', async () => {
    const gateway = new StubGateway({ infer: '```json\n' + SUSPICIOUS_REPLY + '\n```' });

    const result = await assessAuthenticity(gateway, sampleImage(), 'passport');

    expect(result).toEqual({
      is_suspected_fraud: true,
      confidence: 0.92,
      explanation: 'Photo edges show cut-and-paste artifacts',
    });
    expect(isFlaggedAsFraud(result)).toBe(true);
    expect(gateway.callsOf('infer')[0].prompt).toBe(PASSPORT_AUTHENTICITY_TEMPLATE.prompt);
  });

  it('should return {} for a reply that breaks the verdict schema', async () => {
    const gateway = new StubGateway({
      infer: '{"is_suspected_fraud": "maybe", "confidence": "high", "explanation": "?"}',
    });
    const before = await absorbedCount('authenticity', 'malformed_response');

    const result = await assessAuthenticity(gateway, sampleImage(), 'drivers_license');

    expect(result).toEqual({});
    expect(isEmptyVerdict(result)).toBe(true);
    expect(isFlaggedAsFraud(result)).toBe(false);
    expect(await absorbedCount('authenticity', 'malformed_response')).toBe(before + 1);
  });

  it('should return {} for a verdict wrapped in an array', async () => {
    const gateway = new StubGateway({
      infer: '[{"is_suspected_fraud": true, "confidence": 0.9, "explanation": "x"}]',
    });

    const result = await assessAuthenticity(gateway, sampleImage(), 'passport');

    expect(result).toEqual({});
    expect(isFlaggedAsFraud(result)).toBe(false);
  });

  it('should return {} for prose', async () => {
    const gateway = new StubGateway({ infer: 'The document appears authentic.' });

    expect(await assessAuthenticity(gateway, sampleImage(), 'passport')).toEqual({});
  });

  it('should return {} when the gateway fails', async () => {
    const gateway = new StubGateway({ infer: new Error('503 Service Unavailable') });

    const result = await assessAuthenticity(gateway, sampleImage(), 'passport');

    expect(result).toEqual({});
    expect(isFlaggedAsFraud(result)).toBe(false);
  });
});
