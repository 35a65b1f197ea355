import { GoogleGenAI, type GenerateContentConfig, type GenerateContentResponse } from '@google/genai';
import type { LlmConfig } from '../../shared/config';
import { sleep } from '../utils/async';
import { Mutex } from '../utils/concurrency';

type KeyState = {
  client: GoogleGenAI;
  requestTimestamps: number[];
  rateLimitMutex: Mutex;
  lastUsedAt: number;
};

const stateByApiKey = new Map<string, KeyState>();
const MAX_KEYS = 32;
const WINDOW_MS = 60_000;
const MAX_ATTEMPTS = 5;

const trimStateCache = () => {
  if (stateByApiKey.size <= MAX_KEYS) {
    return;
  }
  let oldestKey: string | null = null;
  let oldestTs = Infinity;
  for (const [key, state] of stateByApiKey.entries()) {
    if (state.lastUsedAt < oldestTs) {
      oldestTs = state.lastUsedAt;
      oldestKey = key;
    }
  }
  if (oldestKey) {
    stateByApiKey.delete(oldestKey);
  }
};

const getStateForApiKey = (apiKey: string): KeyState => {
  const existing = stateByApiKey.get(apiKey);
  if (existing) {
    existing.lastUsedAt = Date.now();
    return existing;
  }

  const created: KeyState = {
    client: new GoogleGenAI({ apiKey }),
    requestTimestamps: [],
    rateLimitMutex: new Mutex(),
    lastUsedAt: Date.now(),
  };
  stateByApiKey.set(apiKey, created);
  trimStateCache();
  return created;
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/** HTTP-ish status carried by SDK errors (`ApiError.status`) or raw error payloads (`error.code`). */
export const errorStatus = (error: unknown): number | null => {
  if (!isRecord(error)) return null;
  if (typeof error.status === 'number') return error.status;
  if (isRecord(error.error) && typeof error.error.code === 'number') return error.error.code;
  return null;
};

const parseRetryDelayMs = (error: unknown): number | null => {
  if (!isRecord(error)) return null;
  const nested = isRecord(error.error) ? error.error.details : undefined;
  const details = Array.isArray(nested) ? nested : Array.isArray(error.details) ? error.details : [];
  for (const detail of details) {
    if (!isRecord(detail) || typeof detail.retryDelay !== 'string') {
      continue;
    }
    const match = detail.retryDelay.match(/([0-9.]+)s/);
    if (match) {
      return Math.ceil(Number(match[1]) * 1000);
    }
  }
  return null;
};

export const isTransientError = (error: unknown): boolean => {
  const code = errorStatus(error);
  if (code === 429 || code === 503) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return /quota|unavailable|overload|temporar/.test(message);
};

export interface GenerateContentParams {
  model: string;
  prompt: string;
  config?: GenerateContentConfig;
  /** Mapped to `config.abortSignal` for @google/genai. */
  signal?: AbortSignal;
}

export type GenerateContentFn = (llm: LlmConfig, params: GenerateContentParams) => Promise<GenerateContentResponse>;

/**
 * Sliding-window rate limit per API key (never above 10 RPM), plus retries with
 * backoff on transient failures. Non-transient errors are rethrown immediately.
 */
export const rateLimitedGenerateContent: GenerateContentFn = async (llm, params) => {
  const apiKey = llm.apiKey;
  if (!apiKey) {
    throw new Error('GEMINI_API_KEY missing');
  }
  const { client, requestTimestamps, rateLimitMutex } = getStateForApiKey(apiKey);
  const rpm = Math.max(1, Math.min(10, llm.requestsPerMinute));

  let attempt = 0;
  while (attempt < MAX_ATTEMPTS) {
    attempt += 1;

    try {
      if (params.signal?.aborted) {
        throw new Error('Aborted');
      }

      // check and reserve under the lock so concurrent callers cannot both take the last slot
      while (true) {
        const waitMs = await rateLimitMutex.runExclusive(() => {
          const now = Date.now();
          while (requestTimestamps.length > 0 && now - requestTimestamps[0] > WINDOW_MS) {
            requestTimestamps.shift();
          }
          if (requestTimestamps.length < rpm) {
            requestTimestamps.push(now);
            return 0;
          }
          return Math.max(0, requestTimestamps[0] + WINDOW_MS - now);
        }, params.signal);

        if (waitMs <= 0) {
          break;
        }
        await sleep(waitMs, params.signal);
      }

      return await client.models.generateContent({
        model: params.model,
        contents: params.prompt,
        config: { ...params.config, abortSignal: params.config?.abortSignal ?? params.signal },
      });
    } catch (error) {
      if (error instanceof Error && /aborted/i.test(error.message)) {
        throw error;
      }
      if (!isTransientError(error) || attempt >= MAX_ATTEMPTS) {
        throw error instanceof Error ? error : new Error(String(error));
      }
      const backoff = parseRetryDelayMs(error) ?? Math.min(60_000, 1_000 * 2 ** attempt) + Math.floor(Math.random() * 1_000);
      await sleep(backoff, params.signal);
    }
  }

  throw new Error('Failed to generate content after retries');
};

/** Text payload of a generateContent response: the SDK's `text` accessor, else the joined text parts. */
export const extractGenerateContentText = (response: GenerateContentResponse): string | undefined => {
  const direct = response.text;
  if (typeof direct === 'string' && direct.trim()) {
    return direct;
  }
  const chunks: string[] = [];
  for (const candidate of response.candidates ?? []) {
    for (const part of candidate.content?.parts ?? []) {
      if (typeof part.text === 'string') chunks.push(part.text);
    }
  }
  const joined = chunks.join('\n').trim();
  return joined || undefined;
};
