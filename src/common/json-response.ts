import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { MalformedResponseError } from './errors';

/**
 * Extracts JSON from model outputs that may include a <think> prelude or fenced code blocks.
 */
export function sanitizeJsonLikeResponse(text: string): string {
  if (!text) return '{}';
  const out = text.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();
  const fencedMatch = out.match(/```(?:json)?[\r\n]+([\s\S]*?)```/i);
  if (fencedMatch && fencedMatch[1]) {
    return fencedMatch[1].trim();
  }
  const starts = out.indexOf('{');
  const ends = out.lastIndexOf('}');
  if (starts !== -1 && ends !== -1 && ends > starts) {
    return out.substring(starts, ends + 1);
  }
  return out;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a model response into a validated DTO instance.
 * Throws MalformedResponseError when the text is not a JSON object or fails validation.
 */
export function parseJsonResponse<T extends object>(
  text: string | null | undefined,
  dto: ClassConstructor<T>,
  context: string,
): T {
  if (!text || !text.trim()) {
    throw new MalformedResponseError(`${context}: empty response`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(sanitizeJsonLikeResponse(text));
  } catch (error) {
    throw new MalformedResponseError(`${context}: response is not valid JSON`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return validateResponse(raw, dto, context);
}

/** Validates an already decoded response body against a DTO. */
export function validateResponse<T extends object>(raw: unknown, dto: ClassConstructor<T>, context: string): T {
  if (!isRecord(raw)) {
    throw new MalformedResponseError(`${context}: expected a JSON object`);
  }

  const instance = plainToInstance(dto, raw);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    const constraints = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new MalformedResponseError(`${context}: ${constraints.join('; ')}`, { constraints });
  }
  return instance;
}
