// ============================================
// VALLEY ECONOMY - Simulation Engine
// ============================================

import { EventEmitter } from 'events';
import type {
  CityLotDefinition,
  GameConfig,
  GameOutcome,
  GameSpeed,
  GameState,
  GameSummary,
  HistorySample,
  InvestmentDefinition,
  LotPurchaseRecord,
  Owner,
  Position,
  SellRecord,
} from '../models/types.js';
import { GameEventBus } from './events.js';
import { createRng, reseed, resolveSeed, type RngState } from './rng.js';
import { Ledger } from './ledger.js';
import { LotMarket } from './lot-market.js';
import { RestaurantSimulator } from './restaurant.simulator.js';
import { InvestmentBook, type PortfolioTotals } from './investment-book.js';
import { RivalAgent } from './rival.agent.js';
import { PortfolioHistoryTracker } from './portfolio-history.tracker.js';
import { buildGameSummary, type SummaryFacts } from './summary.builder.js';
import { fail, type EconomyFailure, type EconomyResult } from './results.js';

// ============================================
// Activity Logger
// ============================================

export type ActivityLogger = (type: string, message: string, metadata?: Record<string, unknown>) => void;

// ============================================
// Configuration
// ============================================

const DEFAULT_TICK_INTERVAL_MS = 1000;  // One in-game day per second

export interface SimulationEngineOptions {
  config: GameConfig;
  /** Fixed volatility seed. When unset every new game seeds from the clock. */
  seed?: number;
  tickIntervalMs?: number;
}

// ============================================
// Read Models
// ============================================

export interface EngineStatus {
  state: GameState;
  tick: number;
  running: boolean;
  speed: GameSpeed;
  seed: number;
}

export interface EconomySnapshot {
  balance: number;
  netWorth: number;
  lotIncomePerTick: number;
  restaurant: {
    level: number;
    maxLevel: number;
    incomePerTick: number;
    nextIncomePerTick: number | null;
    upgradeCost: number | null;
    totalEarned: number;
    totalLotIncome: number;
  };
}

export interface PositionView extends Position {
  displayName: string;
  gain: number;
}

export interface PortfolioSnapshot {
  positions: PositionView[];
  totals: PortfolioTotals;
  investmentsMade: number;
  principalInvested: number;
  peakPortfolioValue: number;
}

export interface LotView extends CityLotDefinition {
  owner: Owner;
  purchasedAtTick: number | null;
}

export interface RivalSnapshot {
  balance: number;
  incomePerTick: number;
  aggressionMultiplier: number;
  effectiveInterval: number;
  ticksUntilAttempt: number;
  targetLotId: string | null;
  lotsOwned: number;
  purchasesMade: number;
}

// ============================================
// Simulation Engine
// ============================================

export class SimulationEngine extends EventEmitter {
  readonly bus = new GameEventBus();

  private config: GameConfig;
  private configuredSeed?: number;
  private seed: number;
  private rng: RngState;
  private tickIntervalMs: number;

  private ledger: Ledger;
  private market: LotMarket;
  private restaurant: RestaurantSimulator;
  private investments: InvestmentBook;
  private rival: RivalAgent;
  private history: PortfolioHistoryTracker;

  private state: GameState = 'not_started';
  private currentTick: number = 0;
  private running: boolean = false;
  private speed: GameSpeed = 1;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private summary: GameSummary | null = null;
  private activityLogger?: ActivityLogger;

  constructor(options: SimulationEngineOptions) {
    super();
    this.config = options.config;
    this.configuredSeed = options.seed;
    this.seed = resolveSeed(options.seed);
    this.rng = createRng(this.seed);
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;

    // Components log through this indirection so setActivityLogger applies to them
    const log: ActivityLogger = (type, message, metadata) => this.activityLogger?.(type, message, metadata);

    this.ledger = new Ledger(this.bus, this.config.startingBalance, log);
    this.market = new LotMarket(this.config.lots, this.bus, log);
    this.restaurant = new RestaurantSimulator(this.config.restaurant, this.ledger, this.market, this.bus, log);
    this.investments = new InvestmentBook(this.config.investments, this.ledger, this.bus, this.rng, log);
    this.rival = new RivalAgent(this.config.rival, this.market, this.bus, log);
    this.history = new PortfolioHistoryTracker(this.config.history);

    this.bus.on('game_ended', ({ outcome, tick }) => {
      this.state = outcome;
      this.stop();
      this.summary = buildGameSummary(this.collectSummaryFacts(outcome, tick));
      console.log(`[SimulationEngine] Game ${outcome} at tick ${tick}`);
    });
  }

  /**
   * Set activity logger callback for simulation events
   */
  setActivityLogger(logger: ActivityLogger): void {
    this.activityLogger = logger;
  }

  // ── Lifecycle ──

  getState(): GameState {
    return this.state;
  }

  getCurrentTick(): number {
    return this.currentTick;
  }

  isRunning(): boolean {
    return this.running;
  }

  isActive(): boolean {
    return this.state === 'playing' || this.state === 'paused';
  }

  getStatus(): EngineStatus {
    return { state: this.state, tick: this.currentTick, running: this.running, speed: this.speed, seed: this.seed };
  }

  /**
   * Start a fresh session from the authored configuration.
   */
  newGame(seed?: number): void {
    this.stop();
    this.resetComponents(seed);
    this.state = 'playing';
    console.log(`[SimulationEngine] New game started (seed=${this.seed})`);
    this.bus.emit('game_started', { startingBalance: this.config.startingBalance });
  }

  /**
   * Return to the pre-game state with everything zeroed.
   */
  reset(): void {
    this.stop();
    this.resetComponents();
    this.state = 'not_started';
    console.log('[SimulationEngine] Reset');
  }

  getSpeed(): GameSpeed {
    return this.speed;
  }

  /**
   * Start the real-time loop. Resumes a paused game, at 1x when the
   * speed was 0.
   */
  start(): void {
    if (this.running) return;
    if (this.state === 'paused') this.state = 'playing';
    if (this.state !== 'playing') return;
    if (this.speed === 0) this.setSpeed(1);

    this.running = true;
    this.scheduleTicks();
    this.emit('started');
    console.log(`[SimulationEngine] Started (${this.tickIntervalMs / this.speed}ms per tick)`);
  }

  /**
   * Change the real-time speed. A running loop is rescheduled at once;
   * speed 0 pauses the game.
   */
  setSpeed(speed: GameSpeed): void {
    if (speed === this.speed) return;

    this.speed = speed;
    console.log(`[SimulationEngine] Speed set to ${speed}x`);
    this.bus.emit('speed_changed', { speed });

    if (speed === 0) {
      this.pause();
    } else if (this.running) {
      this.scheduleTicks();
    }
  }

  /**
   * Stop the real-time loop
   */
  stop(): void {
    if (!this.running) return;

    this.running = false;
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    this.emit('stopped');
    console.log('[SimulationEngine] Stopped');
  }

  pause(): boolean {
    if (this.state !== 'playing') return false;
    this.stop();
    this.state = 'paused';
    return true;
  }

  resume(): boolean {
    if (this.state !== 'paused') return false;
    this.state = 'playing';
    this.start();
    return true;
  }

  /**
   * Execute one simulation tick. Returns false when no game is active.
   */
  tick(): boolean {
    if (!this.isActive()) return false;

    this.currentTick++;
    const tick = this.currentTick;

    // 1. Restaurant and lot income
    this.restaurant.simulate();

    // 2. Compounding
    this.investments.tick();

    // 3. Rival income and purchase attempts
    this.rival.simulate(tick);

    // 4. Ownership resolution
    this.market.checkWinLose(tick);

    // 5. Wealth sampling
    this.history.record(tick, this.getNetWorth(), this.config.startingBalance);

    this.bus.emit('tick', { tick });
    return true;
  }

  /**
   * Step up to `ticks` times, stopping early when the game ends.
   */
  advance(ticks: number): number {
    let ran = 0;
    while (ran < ticks && this.tick()) {
      ran++;
    }
    return ran;
  }

  /** Null until the game has ended. */
  getSummary(): GameSummary | null {
    return this.summary;
  }

  // ── Player Actions ──

  buyLot(lotId: string): EconomyResult<LotPurchaseRecord> {
    if (!this.isActive()) return this.inactive();
    return this.market.attemptPurchase(lotId, 'player', this.ledger, { tick: this.currentTick });
  }

  openInvestment(definitionId: string, amount: number): EconomyResult<Position> {
    if (!this.isActive()) return this.inactive();
    return this.investments.open(definitionId, amount, this.currentTick);
  }

  sellInvestment(positionId: string): EconomyResult<SellRecord> {
    if (!this.isActive()) return this.inactive();
    return this.investments.sell(positionId, this.currentTick);
  }

  upgradeRestaurant(): EconomyResult<number> {
    if (!this.isActive()) return this.inactive();
    return this.restaurant.upgrade();
  }

  // ── Queries ──

  getConfig(): GameConfig {
    return this.config;
  }

  getNetWorth(): number {
    return this.ledger.getBalance() + this.investments.getTotals().totalValue;
  }

  getEconomy(): EconomySnapshot {
    const level = this.restaurant.getLevel();
    const upgradeCost = this.restaurant.upgradeCost(level);
    return {
      balance: this.ledger.getBalance(),
      netWorth: this.getNetWorth(),
      lotIncomePerTick: this.market.getPlayerIncomeBonus(),
      restaurant: {
        level,
        maxLevel: this.config.restaurant.maxLevel,
        incomePerTick: this.restaurant.incomeForLevel(level),
        nextIncomePerTick: upgradeCost === null ? null : this.restaurant.incomeForLevel(level + 1),
        upgradeCost,
        totalEarned: this.restaurant.getTotalEarned(),
        totalLotIncome: this.restaurant.getTotalLotIncome(),
      },
    };
  }

  getInvestmentDefinitions(): InvestmentDefinition[] {
    return this.investments.getDefinitions();
  }

  getInvestmentDefinition(id: string): InvestmentDefinition | undefined {
    return this.investments.getDefinition(id);
  }

  getPortfolio(): PortfolioSnapshot {
    const positions = this.investments.getPositions().map(position => ({
      ...position,
      displayName: this.investments.getDefinition(position.definitionId)?.displayName ?? position.definitionId,
      gain: position.currentValue - position.principal,
    }));
    return {
      positions,
      totals: this.investments.getTotals(),
      ...this.investments.getLifetimeStats(),
    };
  }

  projectInvestment(definition: InvestmentDefinition, principal: number, ticks: number): number {
    return this.investments.projectedValue(definition, principal, ticks);
  }

  getSellHistory(): SellRecord[] {
    return this.investments.getSellHistory();
  }

  getHistory(): HistorySample[] {
    return this.history.getSamples();
  }

  getLots(): LotView[] {
    return this.market.getLots().map(lot => ({
      ...lot,
      owner: this.market.getOwner(lot.lotId),
      purchasedAtTick: this.market.getPurchaseTick(lot.lotId),
    }));
  }

  getRival(): RivalSnapshot {
    return {
      balance: this.rival.getBalance(),
      incomePerTick: this.config.rival.incomePerTick,
      aggressionMultiplier: this.rival.aggressionMultiplier(),
      effectiveInterval: this.rival.effectiveInterval(),
      ticksUntilAttempt: this.rival.ticksUntilAttempt(),
      targetLotId: this.rival.getTargetLotId(),
      lotsOwned: this.market.rivalLotCount(),
      purchasesMade: this.rival.getPurchasesMade(),
    };
  }

  // ── Internals ──

  private scheduleTicks(): void {
    if (this.tickTimer) clearInterval(this.tickTimer);
    this.tickTimer = setInterval(() => this.tick(), this.tickIntervalMs / this.speed);
  }

  private inactive(): EconomyFailure {
    return fail('game_not_active', `No game in progress (state: ${this.state})`);
  }

  private resetComponents(seed?: number): void {
    if (seed !== undefined) this.configuredSeed = seed;
    this.seed = resolveSeed(this.configuredSeed);
    reseed(this.rng, this.seed);

    this.currentTick = 0;
    this.summary = null;
    this.ledger.reset(this.config.startingBalance);
    this.market.reset();
    this.restaurant.reset();
    this.investments.reset();
    this.rival.reset();
    this.history.reset();
  }

  private collectSummaryFacts(outcome: GameOutcome, tick: number): SummaryFacts {
    const totals = this.investments.getTotals();
    const lifetime = this.investments.getLifetimeStats();
    const purchases = this.market.getPurchases();

    return {
      outcome,
      ticksPlayed: tick,
      finalBalance: this.ledger.getBalance(),
      netWorth: this.getNetWorth(),
      investments: {
        realizedGain: totals.realizedGain,
        unrealizedGain: totals.unrealizedGain,
        totalGain: totals.realizedGain + totals.unrealizedGain,
        investmentCount: lifetime.investmentsMade,
        totalPrincipalInvested: lifetime.principalInvested,
        peakPortfolioValue: lifetime.peakPortfolioValue,
        openPositions: this.investments.getPositions(),
        sellHistory: this.investments.getSellHistory(),
      },
      lots: {
        ownership: this.market.getOwnershipMap(),
        playerLots: this.market.playerLotCount(),
        rivalLots: this.market.rivalLotCount(),
        totalLots: this.market.totalLots(),
        purchases,
        totalSpentByPlayer: purchases.filter(p => p.owner === 'player').reduce((sum, p) => sum + p.cost, 0),
      },
      restaurant: {
        level: this.restaurant.getLevel(),
        totalIncome: this.restaurant.getTotalEarned(),
        totalLotIncome: this.restaurant.getTotalLotIncome(),
      },
      rival: {
        balance: this.rival.getBalance(),
        lotsOwned: this.market.rivalLotCount(),
      },
    };
  }
}
