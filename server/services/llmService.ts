import type { LlmConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import { errorStatus, extractGenerateContentText, isTransientError, rateLimitedGenerateContent, type GenerateContentFn } from './genai';

export interface GenerateOptions {
  systemInstruction?: string;
  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
  responseMimeType?: string;
  signal?: AbortSignal;
}

/** Anything that turns a prompt into raw model text. */
export interface TextGenerator {
  generate: (prompt: string, options?: GenerateOptions) => Promise<string>;
}

/**
 * Gemini-backed text generation. Tries the configured model, then the fallback
 * model once; the per-call retry and rate limiting live in `rateLimitedGenerateContent`.
 */
export class LLMService implements TextGenerator {
  constructor(
    private readonly config: LlmConfig,
    private readonly logger: Logger,
    private readonly generateContent: GenerateContentFn = rateLimitedGenerateContent,
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const models = Array.from(new Set([this.config.model, this.config.fallbackModel]));
    let lastError: unknown = null;

    for (const model of models) {
      try {
        const response = await this.generateContent(this.config, {
          model,
          prompt,
          config: {
            systemInstruction: options.systemInstruction,
            temperature: options.temperature ?? this.config.temperature,
            topP: options.topP ?? this.config.topP,
            maxOutputTokens: options.maxOutputTokens ?? this.config.maxOutputTokens,
            responseMimeType: options.responseMimeType,
          },
          signal: options.signal,
        });

        const text = extractGenerateContentText(response);
        if (text) return text;

        throw new Error('Empty response from LLM');
      } catch (error) {
        if (options.signal?.aborted) throw error;
        lastError = error;
        this.logger.warn('LLM generation error', {
          model,
          error: error instanceof Error ? error.message : String(error),
          errorCode: errorStatus(error),
          isTransient: isTransientError(error),
        });
      }
    }

    const lastMessage = lastError instanceof Error ? lastError.message : String(lastError);
    throw new Error(`Failed to generate content (models: ${models.join(' -> ')}). Last error: ${lastMessage}`);
  }
}
