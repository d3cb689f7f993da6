// ============================================
// VALLEY ECONOMY - Rival Agent
// ============================================
// Competes with the player for city lots. Earns a flat income every tick
// and tries to buy on an interval that shortens as it takes over the city.

import type { AggressionKeyframe, CityLotDefinition, RivalConfig } from '../models/types.js';
import type { GameEventBus } from './events.js';
import type { LotFunds, LotMarket } from './lot-market.js';
import type { ActivityLogger } from './engine.js';
import { fail, formatMoney, isPositiveAmount, ok, type EconomyResult } from './results.js';

/**
 * Piecewise-linear curve lookup, clamped to the first and last keyframes.
 */
export function evaluateCurve(keyframes: readonly AggressionKeyframe[], progress: number): number {
  if (keyframes.length === 0) return 1;

  const sorted = [...keyframes].sort((a, b) => a.progress - b.progress);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (progress <= first.progress) return first.multiplier;
  if (progress >= last.progress) return last.multiplier;

  for (let i = 1; i < sorted.length; i++) {
    const right = sorted[i];
    if (progress > right.progress) continue;
    const left = sorted[i - 1];
    const span = right.progress - left.progress;
    if (span <= 0) return right.multiplier;
    const t = (progress - left.progress) / span;
    return left.multiplier + (right.multiplier - left.multiplier) * t;
  }
  return last.multiplier;
}

function byCostThenId(a: CityLotDefinition, b: CityLotDefinition): number {
  if (a.baseCost !== b.baseCost) return a.baseCost - b.baseCost;
  return a.lotId < b.lotId ? -1 : a.lotId > b.lotId ? 1 : 0;
}

export class RivalAgent implements LotFunds {
  private balance: number;
  private ticksSincePurchaseAttempt = 0;
  private warnedThisCycle = false;
  private targetLotId: string | null = null;
  private purchasesMade = 0;

  constructor(
    private config: RivalConfig,
    private market: LotMarket,
    private bus: GameEventBus,
    private log?: ActivityLogger
  ) {
    this.balance = config.startingMoney;

    // The player took the announced lot: announce the next one straight away
    this.bus.on('ownership_changed', ({ lotId, newOwner }) => {
      if (newOwner === 'player' && lotId === this.targetLotId) {
        this.retarget();
      }
    });
  }

  getBalance(): number {
    return this.balance;
  }

  debit(amount: number, reasonTag: string): EconomyResult<number> {
    if (!isPositiveAmount(amount)) {
      return fail('invalid_amount', `Debit amount must be positive, got ${amount}`);
    }
    if (this.balance < amount) {
      return fail(
        'insufficient_funds',
        `Rival cannot afford ${reasonTag}: required ${formatMoney(amount)}, available ${formatMoney(this.balance)}`
      );
    }
    this.balance -= amount;
    return ok(this.balance);
  }

  getPurchasesMade(): number {
    return this.purchasesMade;
  }

  /** Lot named by the latest warning this cycle, if any. */
  getTargetLotId(): string | null {
    return this.targetLotId;
  }

  getTicksSincePurchaseAttempt(): number {
    return this.ticksSincePurchaseAttempt;
  }

  aggressionMultiplier(): number {
    if (!this.config.scaleByProgress) return 1;
    return evaluateCurve(this.config.aggressionCurve, this.market.getProgress());
  }

  /**
   * Ticks between purchase attempts at the current progress.
   */
  effectiveInterval(): number {
    if (!this.config.scaleByProgress) return this.config.purchaseIntervalTicks;
    const multiplier = this.aggressionMultiplier();
    return Math.max(this.config.minimumIntervalTicks, Math.round(this.config.purchaseIntervalTicks / multiplier));
  }

  ticksUntilAttempt(): number {
    return Math.max(0, this.effectiveInterval() - this.ticksSincePurchaseAttempt);
  }

  simulate(currentTick: number): void {
    this.balance += this.config.incomePerTick;
    this.ticksSincePurchaseAttempt++;

    const remaining = this.effectiveInterval() - this.ticksSincePurchaseAttempt;

    if (remaining <= 0) {
      this.ticksSincePurchaseAttempt = 0;
      this.warnedThisCycle = false;
      this.targetLotId = null;
      this.attemptPurchase(currentTick);
      return;
    }

    if (!this.warnedThisCycle && remaining <= this.config.warningTicks) {
      this.warnedThisCycle = true;
      const target = this.pickWarningTarget(remaining);
      this.targetLotId = target?.lotId ?? null;
      this.bus.emit('rival_warning', { ticksRemaining: remaining, targetLotId: this.targetLotId });
    }
  }

  reset(): void {
    this.balance = this.config.startingMoney;
    this.ticksSincePurchaseAttempt = 0;
    this.warnedThisCycle = false;
    this.targetLotId = null;
    this.purchasesMade = 0;
  }

  private attemptPurchase(currentTick: number): void {
    const buffer = this.config.purchaseBuffer;
    const target = this.market
      .getAvailableLots()
      .filter(lot => this.balance >= lot.baseCost + buffer)
      .sort(byCostThenId)[0];

    if (!target) {
      this.log?.('rival_waiting', `Rival could not afford a lot with ${formatMoney(this.balance, 0)}`, {
        balance: this.balance, tick: currentTick,
      });
      return;
    }

    const result = this.market.attemptPurchase(target.lotId, 'rival', this, { buffer, tick: currentTick });
    if (result.success) {
      this.purchasesMade++;
    }
  }

  private retarget(): void {
    const remaining = this.ticksUntilAttempt();
    const target = this.pickWarningTarget(remaining);
    this.targetLotId = target?.lotId ?? null;
    this.log?.('rival_retarget', target
      ? `Rival now targets ${target.displayName} in ${remaining} ticks`
      : 'Rival has no lot left to target', { targetLotId: this.targetLotId });
    this.bus.emit('rival_warning', {
      ticksRemaining: target ? remaining : 0,
      targetLotId: this.targetLotId,
    });
  }

  /**
   * Lot the rival expects to go for when the current cycle ends.
   */
  private pickWarningTarget(ticksRemaining: number): CityLotDefinition | undefined {
    const available = this.market.getAvailableLots().sort(byCostThenId);
    const projected = this.balance + this.config.incomePerTick * ticksRemaining + this.config.purchaseBuffer;
    return available.find(lot => projected >= lot.baseCost) ?? available[0];
  }
}
