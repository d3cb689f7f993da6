// ============================================
// VALLEY ECONOMY - Restaurant Income Simulator
// ============================================

import type { RestaurantConfig } from '../models/types.js';
import type { GameEventBus } from './events.js';
import type { Ledger } from './ledger.js';
import type { LotMarket } from './lot-market.js';
import type { ActivityLogger } from './engine.js';
import { fail, formatMoney, ok, type EconomyResult } from './results.js';

export class RestaurantSimulator {
  private level = 1;
  private totalEarned = 0;
  private totalLotIncome = 0;

  constructor(
    private config: RestaurantConfig,
    private ledger: Ledger,
    private market: LotMarket,
    private bus: GameEventBus,
    private log?: ActivityLogger
  ) {}

  getLevel(): number {
    return this.level;
  }

  getTotalEarned(): number {
    return this.totalEarned;
  }

  getTotalLotIncome(): number {
    return this.totalLotIncome;
  }

  /**
   * Per-tick income at a level. Levels past the multiplier table pay the
   * last entry.
   */
  incomeForLevel(level: number): number {
    const multipliers = this.config.incomeMultipliers;
    const index = Math.min(Math.max(Math.floor(level) - 1, 0), multipliers.length - 1);
    return this.config.baseIncomePerTick * multipliers[index];
  }

  /** Cost to go from `level` to `level + 1`, or null when no upgrade exists. */
  upgradeCost(level: number): number | null {
    if (level >= this.config.maxLevel || level < 1) return null;
    const cost = this.config.upgradeCosts[level - 1];
    return cost === undefined ? null : cost;
  }

  upgrade(): EconomyResult<number> {
    const cost = this.upgradeCost(this.level);
    if (cost === null) {
      return fail('at_max_level', `Restaurant is already at level ${this.level}, the highest available`);
    }

    const debit = this.ledger.debit(cost, `Restaurant upgrade to level ${this.level + 1}`);
    if (!debit.success) return debit;

    this.level++;
    this.log?.('restaurant_upgraded', `Restaurant upgraded to level ${this.level} for ${formatMoney(cost, 0)}`, {
      level: this.level, cost,
    });
    this.bus.emit('restaurant_upgraded', { level: this.level, cost });
    return ok(this.level);
  }

  /**
   * Credit one tick of restaurant income, then the player's lot bonus.
   */
  simulate(): void {
    const income = this.incomeForLevel(this.level);
    if (income > 0) {
      const credit = this.ledger.credit(income, 'restaurant');
      if (credit.success) this.totalEarned += income;
    }

    const lotBonus = this.market.getPlayerIncomeBonus();
    if (lotBonus > 0) {
      const credit = this.ledger.credit(lotBonus, 'lot_income');
      if (credit.success) this.totalLotIncome += lotBonus;
    }
  }

  reset(): void {
    this.level = 1;
    this.totalEarned = 0;
    this.totalLotIncome = 0;
  }
}
