// src/config/types.ts
import { z } from 'zod';
import { type envSchema } from './schemas';

/**
 * Validated and coerced environment, as produced by `envSchema`.
 */
export type AppConfig = z.infer<typeof envSchema>;
