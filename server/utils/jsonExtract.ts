import JSON5 from 'json5';
import type { z } from 'zod';

/**
 * JSON extraction helpers for model responses: strips code fences, finds the
 * first balanced object/array and auto-closes payloads that were cut off.
 */

export const stripCodeFence = (value: string): string =>
  value.replace(/^\s*```(?:json|json5|text)?\s*\r?\n?/, '').replace(/```[\s\r\n]*$/, '').trim();

const closerFor = (opener: string): string => (opener === '{' ? '}' : ']');

export const extractBalancedJson = (value: string): string | null => {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  let start = -1;
  let end = -1;
  let inString = false;
  let escapeNext = false;
  const stack: string[] = [];

  for (let i = 0; i < trimmed.length; i += 1) {
    const char = trimmed[i];

    if (inString) {
      if (escapeNext) {
        escapeNext = false;
      } else if (char === '\\') {
        escapeNext = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      if (stack.length === 0) start = i;
      stack.push(char);
    } else if ((char === '}' || char === ']') && stack.length > 0) {
      // a mismatched closer still pops, so one stray bracket cannot wedge the scan
      stack.pop();
      if (stack.length === 0) {
        end = i;
        break;
      }
    }
  }

  if (start === -1) {
    return null;
  }

  let candidate = end !== -1 ? trimmed.slice(start, end + 1) : trimmed.slice(start);
  if (end === -1) {
    if (inString) {
      candidate = `${escapeNext ? candidate.slice(0, -1) : candidate}"`;
    }
    candidate += stack.reverse().map(closerFor).join('');
  }
  return candidate.trim();
};

export const extractJson = (rawResponse: string): string | null => extractBalancedJson(stripCodeFence(rawResponse));

export class StructuredOutputError extends Error {
  constructor(
    message: string,
    readonly raw: string,
  ) {
    super(message);
    this.name = 'StructuredOutputError';
  }
}

/**
 * Extracts, parses (JSON5, so trailing commas and single quotes pass) and
 * validates a model response. Throws StructuredOutputError on any failure.
 */
export const parseStructured = <S extends z.ZodTypeAny>(raw: string, schema: S): z.output<S> => {
  const extracted = extractJson(raw);
  if (!extracted) {
    throw new StructuredOutputError('No JSON found in response', raw);
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(extracted);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StructuredOutputError(`Malformed JSON in response: ${message}`, raw);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new StructuredOutputError(`Unexpected response shape: ${result.error.issues[0]?.message ?? 'invalid'}`, raw);
  }
  return result.data;
};
