// src/utils/closeParams.ts
import { z } from 'zod';
import type { CloseParams } from '../interfaces/common';

const closeParamsSchema = z.object({
  code: z.number().int(),
  reason: z.string(),
});

/**
 * Builds close parameters from loosely typed input, such as values read from
 * configuration. The pair is used only when the code is an integer and the
 * reason a string; any other combination yields `undefined`, which selects
 * the zero-argument close.
 */
export function closeParamsFrom(code: unknown, reason: unknown): CloseParams | undefined {
  const parsed = closeParamsSchema.safeParse({ code, reason });
  return parsed.success ? parsed.data : undefined;
}
