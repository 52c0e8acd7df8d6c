/**
 * Zod schemas for the HNB rates API
 *
 * Only the fields read by the provider are declared; unknown keys pass through.
 */

import { z } from 'zod';

import { UpstreamRateValueSchema } from '../shared/schemas.js';

export const HnbRateEntrySchema = z
  .object({
    buyingRate: UpstreamRateValueSchema.optional(),
    currency: z.string().optional(),
    currencyCode: z.string().optional(),
    sellingRate: UpstreamRateValueSchema.optional(),
    updated_on: z.string().nullish(),
  })
  .passthrough();

export const HnbResponseSchema = z
  .object({
    ex: z.array(HnbRateEntrySchema).default([]),
  })
  .passthrough();

export type HnbRateEntry = z.infer<typeof HnbRateEntrySchema>;
export type HnbResponse = z.infer<typeof HnbResponseSchema>;
