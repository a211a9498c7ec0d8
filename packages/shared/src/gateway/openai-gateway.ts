/**
 * OpenAI-compatible Model Gateway
 *
 * Works against any chat completions endpoint speaking the OpenAI protocol
 * (OpenAI itself, Fireworks, a local vLLM) via LLM_BASE_URL.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { logger } from '../logger';
import { config as defaultConfig, type Config } from '../config';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import type { DocumentImage } from '../types';
import { toDataUrl, type GatewayOperation, type ModelGateway } from './model-gateway';

export const TRANSCRIPTION_PROMPT = 'Transcribe all legible text exactly as seen (no summaries).';

/**
 * The slice of the OpenAI client the gateway uses
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
        id?: string;
        choices: Array<{ message: { content: string | null } }>;
        usage?: { total_tokens: number };
      }>;
    };
  };
}

export interface OpenAiGatewayOptions {
  visionModel: string;
  ocrModel: string;
}

export class OpenAiModelGateway implements ModelGateway {
  readonly visionModel: string;
  readonly ocrModel: string;

  constructor(
    private readonly client: ChatCompletionClient,
    options: OpenAiGatewayOptions
  ) {
    this.visionModel = options.visionModel;
    this.ocrModel = options.ocrModel;
  }

  /**
   * Build a gateway with its own OpenAI client from configuration.
   */
  static fromConfig(cfg: Config = defaultConfig): OpenAiModelGateway {
    const client = new OpenAI({
      apiKey: cfg.llmApiKey,
      baseURL: cfg.llmBaseUrl,
      timeout: cfg.llmRequestTimeoutMs,
      maxRetries: 0, // No retries: a failed call degrades to an empty result upstream
    });

    return new OpenAiModelGateway(client, {
      visionModel: cfg.llmModelVision,
      ocrModel: cfg.llmModelOcr,
    });
  }

  async infer(image: DocumentImage, prompt: string): Promise<string> {
    return this.send('infer', this.visionModel, {
      model: this.visionModel,
      temperature: 0,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'image_url', image_url: { url: toDataUrl(image) } },
            { type: 'text', text: prompt },
          ],
        },
      ],
    });
  }

  async transcribe(image: DocumentImage): Promise<string> {
    return this.send('transcribe', this.ocrModel, {
      model: this.ocrModel,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'image_url', image_url: { url: toDataUrl(image) } },
            { type: 'text', text: TRANSCRIPTION_PROMPT },
          ],
        },
      ],
    });
  }

  async complete(prompt: string): Promise<string> {
    return this.send('complete', this.visionModel, {
      model: this.visionModel,
      temperature: 0,
      messages: [{ role: 'user', content: prompt }],
    });
  }

  private async send(
    operation: GatewayOperation,
    model: string,
    body: ChatCompletionCreateParamsNonStreaming
  ): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(body);
      const durationMs = Date.now() - startTime;

      llmRequestsCounter.inc({ model, operation, status: 'success' });
      llmRequestDurationHistogram.observe({ model, operation }, durationMs / 1000);

      logger.info('Model call complete', {
        model,
        operation,
        request_id: response.id,
        duration_ms: durationMs,
        tokens_used: response.usage?.total_tokens,
      });

      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      llmRequestsCounter.inc({ model, operation, status: 'error' });

      logger.error('Model call failed', error, {
        model,
        operation,
        duration_ms: Date.now() - startTime,
      });

      throw error;
    }
  }
}
