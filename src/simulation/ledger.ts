// ============================================
// VALLEY ECONOMY - Player Ledger
// ============================================
// Single pool holding all player currency. Nothing else writes the balance.

import type { GameEventBus } from './events.js';
import type { ActivityLogger } from './engine.js';
import { fail, formatMoney, isPositiveAmount, ok, type EconomyResult } from './results.js';

export class Ledger {
  private balance: number;

  constructor(
    private bus: GameEventBus,
    startingBalance: number,
    private log?: ActivityLogger
  ) {
    this.balance = startingBalance;
  }

  getBalance(): number {
    return this.balance;
  }

  canAfford(amount: number): boolean {
    return Number.isFinite(amount) && amount >= 0 && this.balance >= amount;
  }

  /**
   * Add money to the balance. Returns the new balance.
   */
  credit(amount: number, sourceTag: string): EconomyResult<number> {
    if (!isPositiveAmount(amount)) {
      return fail('invalid_amount', `Credit amount must be positive, got ${amount}`);
    }

    this.balance += amount;
    this.log?.('ledger_credit', `+${formatMoney(amount)} from ${sourceTag}`, {
      amount, sourceTag, balance: this.balance,
    });

    this.bus.emit('balance_changed', { newBalance: this.balance, delta: amount });
    this.bus.emit('income_generated', { amount, sourceTag });
    return ok(this.balance);
  }

  /**
   * Remove money from the balance, all or nothing. Returns the new balance.
   */
  debit(amount: number, reasonTag: string): EconomyResult<number> {
    if (!isPositiveAmount(amount)) {
      return fail('invalid_amount', `Debit amount must be positive, got ${amount}`);
    }

    if (this.balance < amount) {
      return fail(
        'insufficient_funds',
        `Insufficient funds for ${reasonTag}: required ${formatMoney(amount)}, available ${formatMoney(this.balance)}`
      );
    }

    this.balance -= amount;
    this.log?.('ledger_debit', `-${formatMoney(amount)} for ${reasonTag}`, {
      amount, reasonTag, balance: this.balance,
    });

    this.bus.emit('balance_changed', { newBalance: this.balance, delta: -amount });
    return ok(this.balance);
  }

  /**
   * Reinitialize the balance as if credited from zero.
   */
  reset(startingBalance: number): void {
    this.balance = startingBalance;
    this.bus.emit('balance_changed', { newBalance: this.balance, delta: startingBalance });
  }
}
