// ============================================
// VALLEY ECONOMY - Game Service
// ============================================
// Sits between the HTTP controllers and the simulation engine. Turns
// economy failures into AppErrors so the error handler can render them.

import { ConflictError, InsufficientFundsError, NotFoundError, ValidationError, AppError } from '../plugins/error-handler.plugin.js';
import {
  explainInvestment,
  explainInvestmentVsSaving,
  explainLotPurchase,
  explainRestaurantUpgrade,
  explainRival,
  paybackTicks,
} from '../simulation/explanations.js';
import type { SimulationEngine, EngineStatus, EconomySnapshot, LotView, RivalSnapshot } from '../simulation/engine.js';
import type { EconomyFailure, EconomyResult } from '../simulation/results.js';
import type { GameSpeed, GameSummary, InvestmentDefinition, Owner } from '../models/types.js';
import type { NewGameInput, ProjectionQuery } from '../schemas/index.js';

export interface InvestmentDefinitionView extends InvestmentDefinition {
  explanation: string;
}

export interface LotListing extends LotView {
  paybackTicks: number;
  explanation: string;
}

export interface Projection {
  definitionId: string;
  principal: number;
  ticks: number;
  projectedValue: number;
  projectedGain: number;
  explanation: string;
}

export interface EconomyView extends EconomySnapshot {
  explanation: string;
}

export interface RivalView extends RivalSnapshot {
  explanation: string;
}

export function toAppError(failure: EconomyFailure): AppError {
  switch (failure.reason) {
    case 'insufficient_funds':
      return new InsufficientFundsError(failure.error);
    case 'invalid_amount':
      return new ValidationError(failure.error);
    case 'lot_not_found':
    case 'position_not_found':
    case 'definition_not_found':
      return new AppError(failure.error, 404, 'NOT_FOUND');
    case 'lot_already_owned':
    case 'at_max_level':
    case 'game_not_active':
      return new ConflictError(failure.error);
  }
}

function unwrap<T>(result: EconomyResult<T>): T {
  if (!result.success) {
    throw toAppError(result);
  }
  return result.value;
}

export class GameService {
  constructor(private engine: SimulationEngine) {}

  // ── Session ──

  getStatus(): EngineStatus {
    return this.engine.getStatus();
  }

  newGame(input: NewGameInput): EngineStatus {
    this.engine.newGame(input.seed);
    if (input.run) {
      this.engine.start();
    }
    return this.engine.getStatus();
  }

  start(): EngineStatus {
    this.requireActiveGame();
    this.engine.start();
    return this.engine.getStatus();
  }

  stop(): EngineStatus {
    this.engine.pause();
    return this.engine.getStatus();
  }

  advance(ticks: number): EngineStatus & { ticksAdvanced: number } {
    this.requireActiveGame();
    const ticksAdvanced = this.engine.advance(ticks);
    return { ...this.engine.getStatus(), ticksAdvanced };
  }

  reset(): EngineStatus {
    this.engine.reset();
    return this.engine.getStatus();
  }

  setSpeed(speed: GameSpeed): EngineStatus {
    this.engine.setSpeed(speed);
    return this.engine.getStatus();
  }

  // ── Economy ──

  getEconomy(): EconomyView {
    const economy = this.engine.getEconomy();
    return { ...economy, explanation: explainRestaurantUpgrade(economy.restaurant) };
  }

  upgradeRestaurant() {
    const level = unwrap(this.engine.upgradeRestaurant());
    return { level, economy: this.getEconomy() };
  }

  // ── Investments ──

  getInvestmentDefinitions(): InvestmentDefinitionView[] {
    return this.engine.getInvestmentDefinitions().map(definition => ({
      ...definition,
      explanation: explainInvestment(definition),
    }));
  }

  getPortfolio() {
    return this.engine.getPortfolio();
  }

  openInvestment(definitionId: string, amount: number) {
    return unwrap(this.engine.openInvestment(definitionId, amount));
  }

  sellInvestment(positionId: string) {
    return unwrap(this.engine.sellInvestment(positionId));
  }

  project(query: ProjectionQuery): Projection {
    const definition = this.engine.getInvestmentDefinition(query.definitionId);
    if (!definition) {
      throw new NotFoundError('Investment', query.definitionId);
    }
    const projectedValue = this.engine.projectInvestment(definition, query.principal, query.ticks);
    return {
      definitionId: definition.id,
      principal: query.principal,
      ticks: query.ticks,
      projectedValue,
      projectedGain: projectedValue - query.principal,
      explanation: explainInvestmentVsSaving(definition, query.principal, query.ticks),
    };
  }

  getHistory() {
    return this.engine.getHistory();
  }

  getSales() {
    return this.engine.getSellHistory();
  }

  // ── Lots ──

  getLots(owner?: Owner): LotListing[] {
    const balance = this.engine.getEconomy().balance;
    return this.engine
      .getLots()
      .filter(lot => !owner || lot.owner === owner)
      .map(lot => ({
        ...lot,
        paybackTicks: paybackTicks(lot),
        explanation: explainLotPurchase(lot, balance),
      }));
  }

  buyLot(lotId: string) {
    const purchase = unwrap(this.engine.buyLot(lotId));
    return { purchase, state: this.engine.getState() };
  }

  // ── Rival & Summary ──

  getRival(): RivalView {
    return { ...this.engine.getRival(), explanation: explainRival(this.engine.getConfig().rival) };
  }

  getSummary(): GameSummary {
    const summary = this.engine.getSummary();
    if (!summary) {
      throw new ConflictError(`The game summary is available once the game ends (state: ${this.engine.getState()})`);
    }
    return summary;
  }

  private requireActiveGame(): void {
    if (!this.engine.isActive()) {
      throw new ConflictError(`No game in progress (state: ${this.engine.getState()})`);
    }
  }
}
