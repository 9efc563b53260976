/**
 * Request body schemas. Handlers parse with these; a ZodError becomes a 400.
 */

import { z } from 'zod';
import { MAX_BATCH_SIZE } from '../config/env';

const textSchema = z
  .string({ required_error: 'text is required', invalid_type_error: 'text must be a string' })
  .min(1, 'text must not be empty');

export const schemas = {
  predict: z.object({
    text: textSchema,
  }),

  batchPredict: z.object({
    texts: z
      .array(textSchema, { required_error: 'texts is required', invalid_type_error: 'texts must be an array' })
      .min(1, 'texts must hold at least one item')
      .max(MAX_BATCH_SIZE, `texts must hold at most ${MAX_BATCH_SIZE} items`),
  }),
};
