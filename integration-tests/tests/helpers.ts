/**
 * Test Helpers
 *
 * Deterministic stand-in for the model gateway plus sample records.
 */

import {
  absorbedFailuresCounter,
  type AbsorptionStage,
  type DocumentImage,
  type FailureKind,
  type GatewayOperation,
  type ModelGateway,
} from '@idverify/shared';

/** A canned reply, an error to throw, or a function of the prompt */
export type StubReply = string | Error | ((prompt: string) => string);

export interface StubReplies {
  infer?: StubReply;
  transcribe?: StubReply;
  complete?: StubReply;
}

export interface StubCall {
  operation: GatewayOperation;
  prompt: string;
  mimeType?: string;
}

export class StubGateway implements ModelGateway {
  readonly visionModel = 'stub-vision';
  readonly calls: StubCall[] = [];

  constructor(private readonly replies: StubReplies = {}) {}

  async infer(image: DocumentImage, prompt: string): Promise<string> {
    this.calls.push({ operation: 'infer', prompt, mimeType: image.mimeType });
    return this.reply(this.replies.infer, prompt);
  }

  async transcribe(image: DocumentImage): Promise<string> {
    this.calls.push({ operation: 'transcribe', prompt: '', mimeType: image.mimeType });
    return this.reply(this.replies.transcribe, '');
  }

  async complete(prompt: string): Promise<string> {
    this.calls.push({ operation: 'complete', prompt });
    return this.reply(this.replies.complete, prompt);
  }

  callsOf(operation: GatewayOperation): StubCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  private reply(reply: StubReply | undefined, prompt: string): string {
    if (reply === undefined) {
      return '';
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(prompt) : reply;
  }
}

export function sampleImage(mimeType = 'image/jpeg'): DocumentImage {
  return { bytes: Buffer.from('not-really-an-image'), mimeType };
}

/** 2026-10-19, noon UTC */
export const FIXED_NOW = new Date('2026-10-19T12:00:00Z');
export const fixedClock = (): Date => FIXED_NOW;

export const SAMPLE_PASSPORT = {
  name: 'JOHN Q DOE',
  dob: '1990-03-04',
  issuing_country: 'usa',
  id_number: 'X1234567',
  expiry_date: '2030-01-01',
};

export const SAMPLE_LICENSE = {
  name: 'Doe John Q',
  dob: '03/04/1990',
  issuing_state: 'ca',
  id_number: 'D7654321',
  expiry_date: '2029-06-30',
  address: '1 Main St, Sacramento, CA 95814',
};

export const PASSPORT_REPLY = JSON.stringify(SAMPLE_PASSPORT);
export const LICENSE_REPLY = JSON.stringify(SAMPLE_LICENSE);

export async function absorbedCount(stage: AbsorptionStage, kind: FailureKind): Promise<number> {
  const metric = await absorbedFailuresCounter.get();
  const entry = metric.values.find(
    (value) => value.labels.stage === stage && value.labels.kind === kind
  );
  return entry?.value ?? 0;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
