import type { z } from 'zod';

import { badRequestError } from '../utils/errors';

/**
 * Parses request input with a zod schema. Failures become `400 BAD_REQUEST`
 * with the flattened issues as details.
 */
export const parseInput = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  label = 'Request validation failed',
): T => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw badRequestError(label, parsed.error.flatten());
  }

  return parsed.data;
};
