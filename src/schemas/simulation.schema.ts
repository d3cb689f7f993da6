// ============================================
// VALLEY ECONOMY - Simulation Schemas
// ============================================

import { z } from 'zod';

export const MAX_ADVANCE_TICKS = 10000;

// New game (optionally start the real-time loop straight away)
export const newGameSchema = z.object({
  run: z.boolean().default(false),
  seed: z.number().int().optional(),
});

// Manual stepping
export const advanceSchema = z.object({
  ticks: z.number().int().min(1).max(MAX_ADVANCE_TICKS).default(1),
});

// Real-time speed multiplier (0 pauses)
export const speedSchema = z.object({
  speed: z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(4)]),
});

// Type exports
export type NewGameInput = z.infer<typeof newGameSchema>;
export type AdvanceInput = z.infer<typeof advanceSchema>;
export type SpeedInput = z.infer<typeof speedSchema>;
