import { z } from 'zod/v4';
import { HealthSchema } from '../schemas/index.js';

export type Health = z.infer<typeof HealthSchema>;
