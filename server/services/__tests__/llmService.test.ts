import { GenerateContentResponse } from '@google/genai';
import { describe, expect, it, vi } from 'vitest';
import type { LlmConfig } from '../../../shared/config';
import { createSilentLogger } from '../../obs/logger';
import type { GenerateContentFn } from '../genai';
import { LLMService } from '../llmService';

const llmConfig: LlmConfig = {
  enabled: true,
  apiKey: 'test-secret',
  model: 'primary',
  fallbackModel: 'fallback',
  temperature: 0.7,
  topP: 0.9,
  maxOutputTokens: 1_000,
  requestsPerMinute: 10,
  enhance: false,
};

const textResponse = (text: string): GenerateContentResponse => {
  const response = new GenerateContentResponse();
  response.candidates = [{ content: { role: 'model', parts: [{ text }] } }];
  return response;
};

const logger = createSilentLogger();

describe('LLMService.generate', () => {
  it('forwards options and returns the primary model text', async () => {
    const generateContent = vi.fn<GenerateContentFn>(async () => textResponse('{"ok":true}'));
    const service = new LLMService(llmConfig, logger, generateContent);

    const text = await service.generate('prompt', {
      systemInstruction: 'system',
      temperature: 0.2,
      responseMimeType: 'application/json',
    });

    expect(text).toBe('{"ok":true}');
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(generateContent).toHaveBeenCalledWith(llmConfig, {
      model: 'primary',
      prompt: 'prompt',
      config: {
        systemInstruction: 'system',
        temperature: 0.2,
        topP: 0.9,
        maxOutputTokens: 1_000,
        responseMimeType: 'application/json',
      },
      signal: undefined,
    });
  });

  it('falls back to the second model when the first fails', async () => {
    const generateContent = vi.fn<GenerateContentFn>(async (_llm, params) => {
      if (params.model === 'primary') throw new Error('overloaded');
      return textResponse('from fallback');
    });
    const service = new LLMService(llmConfig, logger, generateContent);

    await expect(service.generate('prompt')).resolves.toBe('from fallback');
    expect(generateContent.mock.calls.map(([, params]) => params.model)).toEqual(['primary', 'fallback']);
  });

  it('treats an empty answer as a failure', async () => {
    const generateContent = vi.fn<GenerateContentFn>(async () => new GenerateContentResponse());
    const service = new LLMService(llmConfig, logger, generateContent);

    await expect(service.generate('prompt')).rejects.toThrow(
      'Failed to generate content (models: primary -> fallback). Last error: Empty response from LLM',
    );
  });

  it('tries a model only once when the fallback is the same model', async () => {
    const generateContent = vi.fn<GenerateContentFn>(async () => {
      throw new Error('down');
    });
    const service = new LLMService({ ...llmConfig, fallbackModel: 'primary' }, logger, generateContent);

    await expect(service.generate('prompt')).rejects.toThrow(
      'Failed to generate content (models: primary). Last error: down',
    );
    expect(generateContent).toHaveBeenCalledTimes(1);
  });

  it('stops at the first model when the caller aborted', async () => {
    const controller = new AbortController();
    const generateContent = vi.fn<GenerateContentFn>(async () => {
      controller.abort();
      throw new Error('Aborted');
    });
    const service = new LLMService(llmConfig, logger, generateContent);

    await expect(service.generate('prompt', { signal: controller.signal })).rejects.toThrow('Aborted');
    expect(generateContent).toHaveBeenCalledTimes(1);
  });
});
