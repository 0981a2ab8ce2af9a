import { z } from 'zod';
import type { ComplexityEstimate } from './types.js';

const complexitySchema = z.object({
  timeComplexity: z.string().min(1).optional(),
  spaceComplexity: z.string().min(1).optional(),
});

/** Last fenced ```json block of a response, or the last {...} object if there is none. */
export function extractJSON(response: string): string | undefined {
  const fenced = [...response.matchAll(/```json\s*([\s\S]*?)\s*```/g)];
  if (fenced.length > 0) {
    return fenced[fenced.length - 1][1].trim();
  }

  const objects = response.match(/\{[^{}]*\}/g);
  return objects ? objects[objects.length - 1] : undefined;
}

/**
 * Complexity estimate the model was asked to append to algorithm
 * suggestions. Models do not always comply, so anything unparseable is
 * `undefined`.
 */
export function parseComplexity(response: string): ComplexityEstimate | undefined {
  const jsonText = extractJSON(response);
  if (!jsonText) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch {
    return undefined;
  }

  const parsed = complexitySchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const { timeComplexity, spaceComplexity } = parsed.data;
  if (!timeComplexity && !spaceComplexity) return undefined;
  return { time: timeComplexity, space: spaceComplexity };
}
