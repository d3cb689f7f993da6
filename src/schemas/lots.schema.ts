// ============================================
// VALLEY ECONOMY - Lot Schemas
// ============================================

import { z } from 'zod';
import { ownerSchema } from './common.schema.js';

// Lot ID param
export const lotIdParamSchema = z.object({
  lotId: z.string().min(1),
});

// Lot listing filter
export const lotsQuerySchema = z.object({
  owner: ownerSchema.optional(),
});

// Type exports
export type LotIdParams = z.infer<typeof lotIdParamSchema>;
export type LotsQuery = z.infer<typeof lotsQuerySchema>;
