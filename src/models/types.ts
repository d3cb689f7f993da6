// ============================================
// VALLEY ECONOMY - Core Type Definitions
// ============================================

// ============================================
// Authored Definitions
// ============================================

export type RiskLevel = 'low' | 'medium' | 'high';

export interface VolatilityRange {
  min: number;
  max: number;
}

export interface InvestmentDefinition {
  id: string;
  displayName: string;
  description: string;
  riskLevel: RiskLevel;
  annualReturnRate: number;
  volatilityRange: VolatilityRange;
  compoundingFrequencyTicks: number;
  compoundsPerYear: number;
  minimumDeposit: number;
}

export interface GridPosition {
  x: number;
  y: number;
}

export interface CityLotDefinition {
  lotId: string;
  displayName: string;
  description: string;
  baseCost: number;
  incomeBonus: number;
  gridPosition: GridPosition;
}

export interface RestaurantConfig {
  baseIncomePerTick: number;
  maxLevel: number;
  upgradeCosts: number[];      // index 0 = cost to go from level 1 to level 2
  incomeMultipliers: number[]; // index 0 = level 1
}

export interface AggressionKeyframe {
  progress: number;
  multiplier: number;
}

export interface RivalConfig {
  startingMoney: number;
  incomePerTick: number;
  purchaseIntervalTicks: number;
  warningTicks: number;
  purchaseBuffer: number;
  aggressionCurve: AggressionKeyframe[];
  scaleByProgress: boolean;
  minimumIntervalTicks: number;
}

export interface HistoryConfig {
  snapshotIntervalTicks: number;
  maxDataPoints: number;
}

export interface GameConfig {
  startingBalance: number;
  restaurant: RestaurantConfig;
  investments: InvestmentDefinition[];
  lots: CityLotDefinition[];
  rival: RivalConfig;
  history: HistoryConfig;
}

// ============================================
// Runtime State
// ============================================

export type Owner = 'unowned' | 'player' | 'rival';
export type Buyer = Exclude<Owner, 'unowned'>;

export type GameOutcome = 'won' | 'lost';
/** Real-time speed multiplier; 0 holds the clock. */
export type GameSpeed = 0 | 1 | 2 | 4;
export type GameState = 'not_started' | 'playing' | 'paused' | GameOutcome;

export interface Position {
  id: string;
  definitionId: string;
  principal: number;
  currentValue: number;
  ticksHeld: number;
  ticksSinceLastCompound: number;
  compoundCount: number;
  openedAtTick: number;
}

export interface SellRecord {
  positionId: string;
  definitionId: string;
  displayName: string;
  principal: number;
  proceeds: number;
  realizedGain: number;
  percentageReturn: number;
  ticksHeld: number;
  soldAtTick: number;
}

export interface LotPurchaseRecord {
  lotId: string;
  displayName: string;
  owner: Buyer;
  cost: number;
  incomeBonus: number;
  purchasedAtTick: number;
}

export interface HistorySample {
  tick: number;
  totalWealth: number;
  netGain: number;
}

// ============================================
// Game Summary (read-only export for the narrator)
// ============================================

export interface LearningReflections {
  headline: string;
  investmentInsight: string;
  opportunityCostInsight: string;
  whatIfMessage: string;
}

export interface GameSummary {
  outcome: GameOutcome;
  ticksPlayed: number;
  finalBalance: number;
  netWorth: number;
  investments: {
    realizedGain: number;
    unrealizedGain: number;
    totalGain: number;
    investmentCount: number;
    totalPrincipalInvested: number;
    peakPortfolioValue: number;
    openPositions: Position[];
    sellHistory: SellRecord[];
  };
  lots: {
    ownership: Record<string, Owner>;
    playerLots: number;
    rivalLots: number;
    totalLots: number;
    purchases: LotPurchaseRecord[];
    totalSpentByPlayer: number;
  };
  restaurant: {
    level: number;
    totalIncome: number;
    totalLotIncome: number;
  };
  rival: {
    balance: number;
    lotsOwned: number;
  };
  keyDecisions: string[];
  reflections: LearningReflections;
}
