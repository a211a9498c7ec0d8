/**
 * Model Gateway
 *
 * The single I/O boundary of the pipeline: send an image plus a prompt to a
 * vision model, or an image to a transcription model, and get text back.
 * Implementations may throw; callModel() turns that into a GatewayFailure.
 */

import type { DocumentImage } from '../types';
import { GatewayFailure, err, ok, type Result } from '../errors';

export interface ModelGateway {
  /** Name of the vision model, reported on verification reports */
  readonly visionModel: string;

  /** Vision-language call: image + prompt -> reply text */
  infer(image: DocumentImage, prompt: string): Promise<string>;

  /** OCR call: image -> every legible line of text */
  transcribe(image: DocumentImage): Promise<string>;

  /** Text-only call, used by model-assisted name matching */
  complete(prompt: string): Promise<string>;
}

export type GatewayOperation = 'infer' | 'transcribe' | 'complete';

/**
 * Invoke the gateway and capture a thrown error or a missing reply as a GatewayFailure.
 */
export async function callModel(
  operation: GatewayOperation,
  call: () => Promise<string>
): Promise<Result<string>> {
  try {
    const text = await call();
    if (typeof text !== 'string') {
      return err(new GatewayFailure(`Model ${operation} returned no text`));
    }
    return ok(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new GatewayFailure(`Model ${operation} failed: ${reason}`, { cause: error }));
  }
}

/**
 * Encode document bytes as a data URL for image_url message parts.
 */
export function toDataUrl(image: DocumentImage): string {
  return `data:${image.mimeType};base64,${image.bytes.toString('base64')}`;
}
