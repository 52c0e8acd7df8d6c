/**
 * Zod schemas for the Sampath Bank exchange rates API
 */

import { z } from 'zod';

import { UpstreamRateValueSchema } from '../shared/schemas.js';

export const SampathRateEntrySchema = z
  .object({
    CurrCode: z.string().optional(),
    RateWEF: z.string().nullish(), // "with effect from" timestamp, display text
    TTBUY: UpstreamRateValueSchema.optional(),
    TTSEL: UpstreamRateValueSchema.optional(),
  })
  .passthrough();

export const SampathResponseSchema = z
  .object({
    data: z.array(SampathRateEntrySchema).default([]),
    success: z.boolean().optional(),
  })
  .passthrough();

export type SampathRateEntry = z.infer<typeof SampathRateEntrySchema>;
export type SampathResponse = z.infer<typeof SampathResponseSchema>;
