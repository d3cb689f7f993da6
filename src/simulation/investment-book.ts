// ============================================
// VALLEY ECONOMY - Investment Book
// ============================================
// Tracks the player's open positions against the authored catalog.
// Each open() creates an independent position; positions in the same
// definition are never merged.

import type { InvestmentDefinition, Position, SellRecord, VolatilityRange } from '../models/types.js';
import type { GameEventBus } from './events.js';
import type { Ledger } from './ledger.js';
import type { ActivityLogger } from './engine.js';
import { nextFloat, type RngState } from './rng.js';
import { projectedValue, ratePerPeriod } from './compound.calculator.js';
import { fail, formatMoney, isPositiveAmount, ok, type EconomyResult } from './results.js';

export interface PortfolioTotals {
  positionCount: number;
  totalPrincipal: number;
  totalValue: number;
  unrealizedGain: number;
  realizedGain: number;
}

export class InvestmentBook {
  private definitions = new Map<string, InvestmentDefinition>();
  private positions: Position[] = [];
  private sellHistory: SellRecord[] = [];
  private nextPositionNumber = 1;

  // Lifetime stats for the end-of-game summary
  private investmentsMade = 0;
  private principalInvested = 0;
  private peakPortfolioValue = 0;

  constructor(
    catalog: readonly InvestmentDefinition[],
    private ledger: Ledger,
    private bus: GameEventBus,
    private rng: RngState,
    private log?: ActivityLogger
  ) {
    for (const definition of catalog) {
      this.definitions.set(definition.id, definition);
    }
  }

  // ── Catalog ──

  getDefinitions(): InvestmentDefinition[] {
    return [...this.definitions.values()];
  }

  getDefinition(id: string): InvestmentDefinition | undefined {
    return this.definitions.get(id);
  }

  // ── Operations ──

  open(definitionId: string, amount: number, tick: number): EconomyResult<Position> {
    const definition = this.definitions.get(definitionId);
    if (!definition) {
      return fail('definition_not_found', `Investment '${definitionId}' does not exist`);
    }
    if (!isPositiveAmount(amount)) {
      return fail('invalid_amount', `Investment amount must be positive, got ${amount}`);
    }
    if (amount < definition.minimumDeposit) {
      return fail(
        'invalid_amount',
        `${formatMoney(amount, 0)} is below the ${formatMoney(definition.minimumDeposit, 0)} minimum for ${definition.displayName}`
      );
    }

    const debit = this.ledger.debit(amount, `Investment in ${definition.displayName}`);
    if (!debit.success) return debit;

    const position: Position = {
      id: `position_${this.nextPositionNumber++}`,
      definitionId: definition.id,
      principal: amount,
      currentValue: amount,
      ticksHeld: 0,
      ticksSinceLastCompound: 0,
      compoundCount: 0,
      openedAtTick: tick,
    };
    this.positions.push(position);
    this.investmentsMade++;
    this.principalInvested += amount;
    this.peakPortfolioValue = Math.max(this.peakPortfolioValue, this.getTotals().totalValue);

    this.log?.('investment_opened', `Opened ${formatMoney(amount, 0)} in ${definition.displayName}`, {
      positionId: position.id, definitionId: definition.id, amount,
    });
    this.bus.emit('investment_opened', { position: { ...position } });
    return ok({ ...position });
  }

  /**
   * Advance every position by `elapsed` ticks, applying one compounding
   * event per completed period.
   */
  tick(elapsed = 1): void {
    for (const position of this.positions) {
      const definition = this.requireDefinition(position.definitionId);
      position.ticksHeld += elapsed;
      position.ticksSinceLastCompound += elapsed;

      const periods = Math.floor(position.ticksSinceLastCompound / definition.compoundingFrequencyTicks);
      if (periods === 0) continue;
      position.ticksSinceLastCompound -= periods * definition.compoundingFrequencyTicks;

      for (let i = 0; i < periods; i++) {
        this.compound(position, definition);
      }
    }

    this.peakPortfolioValue = Math.max(this.peakPortfolioValue, this.getTotals().totalValue);
  }

  sell(positionId: string, tick: number): EconomyResult<SellRecord> {
    const index = this.positions.findIndex(p => p.id === positionId);
    if (index === -1) {
      return fail('position_not_found', `Position '${positionId}' is not open`);
    }

    const position = this.positions[index];
    const definition = this.requireDefinition(position.definitionId);
    const proceeds = position.currentValue;

    if (proceeds > 0) {
      const credit = this.ledger.credit(proceeds, 'investment_sale');
      if (!credit.success) return credit;
    }
    this.positions.splice(index, 1);

    const sale: SellRecord = {
      positionId: position.id,
      definitionId: definition.id,
      displayName: definition.displayName,
      principal: position.principal,
      proceeds,
      realizedGain: proceeds - position.principal,
      percentageReturn: position.principal > 0 ? (proceeds / position.principal - 1) * 100 : 0,
      ticksHeld: position.ticksHeld,
      soldAtTick: tick,
    };
    this.sellHistory.push(sale);

    this.log?.('investment_sold', `Sold ${definition.displayName} for ${formatMoney(proceeds)} (gain ${formatMoney(sale.realizedGain)})`, {
      positionId, proceeds, realizedGain: sale.realizedGain,
    });
    this.bus.emit('investment_sold', { sale: { ...sale } });
    return ok({ ...sale });
  }

  projectedValue(definition: InvestmentDefinition, principal: number, ticks: number): number {
    return projectedValue(definition, principal, ticks);
  }

  // ── Accounting ──

  getPositions(): Position[] {
    return this.positions.map(p => ({ ...p }));
  }

  getPosition(id: string): Position | undefined {
    const position = this.positions.find(p => p.id === id);
    return position ? { ...position } : undefined;
  }

  getSellHistory(): SellRecord[] {
    return this.sellHistory.map(s => ({ ...s }));
  }

  getTotals(): PortfolioTotals {
    let totalPrincipal = 0;
    let totalValue = 0;
    for (const position of this.positions) {
      totalPrincipal += position.principal;
      totalValue += position.currentValue;
    }
    const realizedGain = this.sellHistory.reduce((sum, s) => sum + s.realizedGain, 0);

    return {
      positionCount: this.positions.length,
      totalPrincipal,
      totalValue,
      unrealizedGain: totalValue - totalPrincipal,
      realizedGain,
    };
  }

  getLifetimeStats(): { investmentsMade: number; principalInvested: number; peakPortfolioValue: number } {
    return {
      investmentsMade: this.investmentsMade,
      principalInvested: this.principalInvested,
      peakPortfolioValue: this.peakPortfolioValue,
    };
  }

  reset(): void {
    this.positions = [];
    this.sellHistory = [];
    this.nextPositionNumber = 1;
    this.investmentsMade = 0;
    this.principalInvested = 0;
    this.peakPortfolioValue = 0;
  }

  // ── Internals ──

  private compound(position: Position, definition: InvestmentDefinition): void {
    const multiplier = this.drawVolatility(definition.volatilityRange);
    const rate = ratePerPeriod(definition) * multiplier;

    position.currentValue = Math.max(0, position.currentValue * (1 + rate));
    position.compoundCount++;

    this.bus.emit('investment_compounded', { position: { ...position }, multiplier });
  }

  private drawVolatility(range: VolatilityRange): number {
    if (range.min === range.max) return range.min;
    return nextFloat(this.rng, range.min, range.max);
  }

  private requireDefinition(id: string): InvestmentDefinition {
    const definition = this.definitions.get(id);
    if (!definition) {
      throw new Error(`Position references unknown investment '${id}'`);
    }
    return definition;
  }
}
