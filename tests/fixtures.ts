// ============================================
// VALLEY ECONOMY - Test Fixtures
// ============================================

import { parseGameConfig } from '../src/config/loader.js';
import type { GameConfigInput } from '../src/schemas/config.schema.js';
import type { CityLotDefinition, GameConfig, InvestmentDefinition, RestaurantConfig, RivalConfig } from '../src/models/types.js';

export function makeDefinition(overrides: Partial<InvestmentDefinition> = {}): InvestmentDefinition {
  return {
    id: 'test_bond',
    displayName: 'Test Bond',
    description: 'A bond used in tests.',
    riskLevel: 'low',
    annualReturnRate: 0.12,
    volatilityRange: { min: 1, max: 1 },
    compoundingFrequencyTicks: 30,
    compoundsPerYear: 12,
    minimumDeposit: 100,
    ...overrides,
  };
}

export function makeLot(lotId: string, baseCost: number, incomeBonus = 0): CityLotDefinition {
  return {
    lotId,
    displayName: lotId,
    description: '',
    baseCost,
    incomeBonus,
    gridPosition: { x: 0, y: 0 },
  };
}

export function makeRestaurantConfig(overrides: Partial<RestaurantConfig> = {}): RestaurantConfig {
  return {
    baseIncomePerTick: 10,
    maxLevel: 5,
    upgradeCosts: [500, 1500, 4000, 10000],
    incomeMultipliers: [1, 1.5, 2.25, 3.5, 5],
    ...overrides,
  };
}

export function makeRivalConfig(overrides: Partial<RivalConfig> = {}): RivalConfig {
  return {
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
    ...overrides,
  };
}

export function testConfigInput(): GameConfigInput {
  return {
    startingBalance: 1000,
    restaurant: makeRestaurantConfig(),
    investments: [
      {
        displayName: 'Savings Bond',
        riskLevel: 'low',
        annualReturnRate: 0.12,
        compoundingFrequencyTicks: 30,
        compoundsPerYear: 12,
        minimumDeposit: 100,
      },
      {
        displayName: 'Index Fund',
        riskLevel: 'medium',
        annualReturnRate: 0.1,
        volatilityRange: { min: 0.5, max: 1.5 },
        compoundingFrequencyTicks: 10,
        compoundsPerYear: 12,
      },
    ],
    lots: [
      { displayName: 'Corner Shop', baseCost: 400, incomeBonus: 2 },
      { displayName: 'River Lot', baseCost: 600, incomeBonus: 3 },
    ],
    rival: {
      startingMoney: 0,
      incomePerTick: 1,
      purchaseIntervalTicks: 60,
      warningTicks: 30,
      purchaseBuffer: 100,
      aggressionCurve: [
        { progress: 0, multiplier: 1 },
        { progress: 1, multiplier: 1 },
      ],
    },
    history: { snapshotIntervalTicks: 5, maxDataPoints: 500 },
  };
}

export function buildTestConfig(overrides: Partial<GameConfigInput> = {}): GameConfig {
  return parseGameConfig({ ...testConfigInput(), ...overrides }, 'test config');
}
