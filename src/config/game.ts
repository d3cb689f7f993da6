// ============================================
// VALLEY ECONOMY - Game Configuration & Rules
// ============================================
// Default authored game data. Loaded through the config schema like any
// external file, so ids left blank here are derived from display names.

import type { GameConfigInput } from '../schemas/config.schema.js';

// ============================================
// Currency
// ============================================
export const CURRENCY = {
  STARTING_BALANCE: 1000,
};

// ============================================
// Restaurant
// ============================================
export const RESTAURANT = {
  baseIncomePerTick: 10,
  maxLevel: 5,
  upgradeCosts: [500, 1500, 4000, 10000],
  incomeMultipliers: [1, 1.5, 2.25, 3.5, 5],
};

// ============================================
// Investments
// ============================================
export const INVESTMENTS: GameConfigInput['investments'] = [
  {
    displayName: 'Savings Bond',
    description: 'A government bond that pays a small, steady return.',
    riskLevel: 'low',
    annualReturnRate: 0.05,
    compoundingFrequencyTicks: 30,
    compoundsPerYear: 12,
    minimumDeposit: 100,
  },
  {
    displayName: 'Index Fund',
    description: 'A basket of many companies. Grows with the market, with some ups and downs.',
    riskLevel: 'medium',
    annualReturnRate: 0.1,
    volatilityRange: { min: 0.5, max: 1.5 },
    compoundingFrequencyTicks: 30,
    compoundsPerYear: 12,
    minimumDeposit: 250,
  },
  {
    displayName: 'Tech Stocks',
    description: 'Shares in young tech companies. Big swings both ways.',
    riskLevel: 'high',
    annualReturnRate: 0.25,
    volatilityRange: { min: -1.5, max: 3 },
    compoundingFrequencyTicks: 15,
    compoundsPerYear: 24,
    minimumDeposit: 500,
  },
];

// ============================================
// City Lots
// ============================================
export const LOTS: GameConfigInput['lots'] = [
  { displayName: 'Corner Bakery', description: 'A small shop on the main street.', baseCost: 800, incomeBonus: 3, gridPosition: { x: 0, y: 0 } },
  { displayName: 'Riverside Cottage', description: 'Quiet homes by the water.', baseCost: 1000, incomeBonus: 4, gridPosition: { x: 1, y: 0 } },
  { displayName: 'Market Square', description: 'Busy stalls every weekend.', baseCost: 1200, incomeBonus: 5, gridPosition: { x: 2, y: 0 } },
  { displayName: 'Old Mill', description: 'Needs work, but the land is good.', baseCost: 1500, incomeBonus: 6, gridPosition: { x: 0, y: 1 } },
  { displayName: 'Harbor Warehouse', description: 'Storage for goods arriving by boat.', baseCost: 2000, incomeBonus: 8, gridPosition: { x: 1, y: 1 } },
  { displayName: 'Downtown Tower', description: 'Offices in the heart of the valley.', baseCost: 3000, incomeBonus: 12, gridPosition: { x: 2, y: 1 } },
  { displayName: 'Hilltop Manor', description: 'The most valuable address in town.', baseCost: 4000, incomeBonus: 15, gridPosition: { x: 1, y: 2 } },
];

// ============================================
// Rival
// ============================================
export const RIVAL = {
  startingMoney: 500,
  incomePerTick: 8,
  purchaseIntervalTicks: 60,
  warningTicks: 30,
  purchaseBuffer: 100,
  aggressionCurve: [
    { progress: 0, multiplier: 1 },
    { progress: 1, multiplier: 1.5 },
  ],
  scaleByProgress: true,
  minimumIntervalTicks: 10,
};

// ============================================
// Portfolio History
// ============================================
export const HISTORY = {
  snapshotIntervalTicks: 5,
  maxDataPoints: 500,
};

export const DEFAULT_GAME_CONFIG: GameConfigInput = {
  startingBalance: CURRENCY.STARTING_BALANCE,
  restaurant: RESTAURANT,
  investments: INVESTMENTS,
  lots: LOTS,
  rival: RIVAL,
  history: HISTORY,
};
