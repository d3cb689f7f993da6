// ============================================
// VALLEY ECONOMY - Investment Schemas
// ============================================

import { z } from 'zod';
import { amountSchema } from './common.schema.js';

// Open a position
export const openInvestmentSchema = z.object({
  definitionId: z.string().min(1),
  amount: amountSchema,
});

// Position ID param
export const positionIdParamSchema = z.object({
  positionId: z.string().min(1),
});

// Projection query
export const projectionQuerySchema = z.object({
  definitionId: z.string().min(1),
  principal: z.coerce.number().finite().positive(),
  ticks: z.coerce.number().int().min(0).max(100000).default(365),
});

// Type exports
export type OpenInvestmentInput = z.infer<typeof openInvestmentSchema>;
export type PositionIdParams = z.infer<typeof positionIdParamSchema>;
export type ProjectionQuery = z.infer<typeof projectionQuerySchema>;
