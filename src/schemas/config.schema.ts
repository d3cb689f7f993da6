// ============================================
// VALLEY ECONOMY - Game Configuration Schemas
// ============================================

import { z } from 'zod';
import { riskLevelSchema } from './common.schema.js';

/**
 * Id used when an authored definition leaves it missing or empty:
 * "Downtown Corner" -> "downtown_corner".
 */
export function deriveId(displayName: string): string {
  return displayName.trim().replace(/\s+/g, '_').toLowerCase();
}

const money = z.number().finite().min(0);
const positiveInt = z.number().int().positive();

// ============================================
// Investments
// ============================================

export const volatilityRangeSchema = z.object({
  min: z.number().finite(),
  max: z.number().finite(),
}).refine(range => range.min <= range.max, {
  message: 'min must not exceed max',
});

export const investmentDefinitionSchema = z.object({
  id: z.string().optional(),
  displayName: z.string().min(1),
  description: z.string().default(''),
  riskLevel: riskLevelSchema,
  annualReturnRate: z.number().min(0).max(0.5),
  volatilityRange: volatilityRangeSchema.default({ min: 1, max: 1 }),
  compoundingFrequencyTicks: positiveInt,
  compoundsPerYear: positiveInt,
  minimumDeposit: money.default(0),
}).transform(({ id, ...definition }) => ({
  id: id || deriveId(definition.displayName),
  ...definition,
}));

// ============================================
// City Lots
// ============================================

export const cityLotDefinitionSchema = z.object({
  lotId: z.string().optional(),
  displayName: z.string().min(1),
  description: z.string().default(''),
  baseCost: money,
  incomeBonus: money,
  gridPosition: z.object({
    x: z.number().int(),
    y: z.number().int(),
  }).default({ x: 0, y: 0 }),
}).transform(({ lotId, ...lot }) => ({
  lotId: lotId || deriveId(lot.displayName),
  ...lot,
}));

// ============================================
// Restaurant
// ============================================

export const restaurantConfigSchema = z.object({
  baseIncomePerTick: money,
  maxLevel: z.number().int().min(1),
  upgradeCosts: z.array(z.number().finite().positive()),
  incomeMultipliers: z.array(z.number().finite().min(0)).min(1),
});

// ============================================
// Rival
// ============================================

export const aggressionKeyframeSchema = z.object({
  progress: z.number().min(0).max(1),
  multiplier: z.number().finite().min(0.1),
});

export const rivalConfigSchema = z.object({
  startingMoney: money,
  incomePerTick: money,
  purchaseIntervalTicks: positiveInt,
  warningTicks: z.number().int().min(0),
  purchaseBuffer: money,
  aggressionCurve: z.array(aggressionKeyframeSchema).default([
    { progress: 0, multiplier: 1 },
    { progress: 1, multiplier: 1.5 },
  ]),
  scaleByProgress: z.boolean().default(true),
  minimumIntervalTicks: positiveInt.default(10),
}).refine(rival => rival.warningTicks < rival.purchaseIntervalTicks, {
  message: 'warningTicks must be less than purchaseIntervalTicks',
  path: ['warningTicks'],
});

// ============================================
// History
// ============================================

export const historyConfigSchema = z.object({
  snapshotIntervalTicks: positiveInt.default(5),
  maxDataPoints: positiveInt.default(500),
});

// ============================================
// Game
// ============================================

export const gameConfigSchema = z.object({
  startingBalance: money,
  restaurant: restaurantConfigSchema,
  investments: z.array(investmentDefinitionSchema),
  lots: z.array(cityLotDefinitionSchema).min(1),
  rival: rivalConfigSchema,
  history: historyConfigSchema.default({}),
}).superRefine((config, ctx) => {
  const seenInvestments = new Set<string>();
  config.investments.forEach((definition, index) => {
    if (seenInvestments.has(definition.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate investment id '${definition.id}'`,
        path: ['investments', index, 'id'],
      });
    }
    seenInvestments.add(definition.id);
  });

  const seenLots = new Set<string>();
  config.lots.forEach((lot, index) => {
    if (seenLots.has(lot.lotId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate lot id '${lot.lotId}'`,
        path: ['lots', index, 'lotId'],
      });
    }
    seenLots.add(lot.lotId);
  });
});

export type GameConfigInput = z.input<typeof gameConfigSchema>;
