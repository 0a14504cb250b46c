import { z } from 'zod/v4';

export const ErrorResponseSchema = z.object({
  error: z.string().min(1),
  details: z.unknown().optional(),
});
