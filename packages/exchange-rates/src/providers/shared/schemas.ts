import { z } from 'zod';

/**
 * Rate value as published by bank JSON APIs: a number or a numeric string
 */
export const UpstreamRateValueSchema = z.union([z.number(), z.string()]);
