// ============================================
// VALLEY ECONOMY - City Lot Market
// ============================================
// Owns the lot catalog and ownership. The only component that declares
// the game won or lost.

import type { Buyer, CityLotDefinition, GameOutcome, LotPurchaseRecord, Owner } from '../models/types.js';
import type { GameEventBus } from './events.js';
import type { ActivityLogger } from './engine.js';
import { fail, formatMoney, ok, type EconomyResult } from './results.js';

/** Anything that can pay for a lot: the player's Ledger or the rival. */
export interface LotFunds {
  getBalance(): number;
  debit(amount: number, reasonTag: string): EconomyResult<number>;
}

export interface PurchaseOptions {
  /** Extra balance the buyer must hold on top of the lot cost. */
  buffer?: number;
  tick: number;
}

export class LotMarket {
  private lots: readonly CityLotDefinition[];
  private ownership = new Map<string, Owner>();
  private purchaseTicks = new Map<string, number>();
  private purchases: LotPurchaseRecord[] = [];
  private playerIncomeBonus = 0;
  private outcome: GameOutcome | null = null;

  constructor(
    lots: readonly CityLotDefinition[],
    private bus: GameEventBus,
    private log?: ActivityLogger
  ) {
    this.lots = lots;
    this.reset();
  }

  attemptPurchase(lotId: string, buyer: Buyer, funds: LotFunds, options: PurchaseOptions): EconomyResult<LotPurchaseRecord> {
    const lot = this.getLot(lotId);
    if (!lot) {
      return fail('lot_not_found', `Lot '${lotId}' does not exist`);
    }

    const owner = this.getOwner(lotId);
    if (owner !== 'unowned') {
      return fail('lot_already_owned', `${lot.displayName} is already owned by the ${owner}`);
    }

    const required = lot.baseCost + (options.buffer ?? 0);
    if (funds.getBalance() < required) {
      return fail(
        'insufficient_funds',
        `Insufficient funds for ${lot.displayName}: required ${formatMoney(required)}, available ${formatMoney(funds.getBalance())}`
      );
    }

    if (lot.baseCost > 0) {
      const debit = funds.debit(lot.baseCost, `Lot purchase: ${lot.displayName}`);
      if (!debit.success) return debit;
    }

    this.ownership.set(lotId, buyer);
    this.purchaseTicks.set(lotId, options.tick);
    if (buyer === 'player') {
      this.playerIncomeBonus += lot.incomeBonus;
    }

    const record: LotPurchaseRecord = {
      lotId,
      displayName: lot.displayName,
      owner: buyer,
      cost: lot.baseCost,
      incomeBonus: lot.incomeBonus,
      purchasedAtTick: options.tick,
    };
    this.purchases.push(record);

    this.log?.('lot_purchased', `${buyer === 'player' ? 'Player' : 'Rival'} bought ${lot.displayName} for ${formatMoney(lot.baseCost, 0)}`, {
      lotId, buyer, cost: lot.baseCost,
    });
    this.bus.emit('ownership_changed', { lotId, newOwner: buyer, tick: options.tick });

    this.checkWinLose(options.tick);
    return ok({ ...record });
  }

  /**
   * Resolve the game once ownership allows it. The first outcome is
   * latched; game_ended fires at most once.
   */
  checkWinLose(tick: number): GameOutcome | null {
    if (this.outcome) return this.outcome;

    const player = this.playerLotCount();
    const rival = this.rivalLotCount();
    const total = this.lots.length;

    let outcome: GameOutcome | null = null;
    if (player === total) {
      outcome = 'won';
    } else if (rival === total) {
      outcome = 'lost';
    } else if (player + rival === total) {
      // Split ownership with nothing left to buy: majority wins, tie loses
      outcome = player > rival ? 'won' : 'lost';
    }

    if (!outcome) return null;

    this.outcome = outcome;
    this.log?.('game_ended', `Game ${outcome} at tick ${tick} (player ${player}, rival ${rival})`, {
      outcome, tick, playerLots: player, rivalLots: rival,
    });
    this.bus.emit('game_ended', { outcome, tick });
    return outcome;
  }

  // ── Queries ──

  getLots(): readonly CityLotDefinition[] {
    return this.lots;
  }

  getLot(lotId: string): CityLotDefinition | undefined {
    return this.lots.find(l => l.lotId === lotId);
  }

  getOwner(lotId: string): Owner {
    return this.ownership.get(lotId) ?? 'unowned';
  }

  getAvailableLots(): CityLotDefinition[] {
    return this.lots.filter(l => this.getOwner(l.lotId) === 'unowned');
  }

  playerLotCount(): number {
    return this.countOwnedBy('player');
  }

  rivalLotCount(): number {
    return this.countOwnedBy('rival');
  }

  totalLots(): number {
    return this.lots.length;
  }

  /** Share of the city held by the rival, in [0, 1]. */
  getProgress(): number {
    if (this.lots.length === 0) return 0;
    return this.rivalLotCount() / this.lots.length;
  }

  getPlayerIncomeBonus(): number {
    return this.playerIncomeBonus;
  }

  getPurchaseTick(lotId: string): number | null {
    return this.purchaseTicks.get(lotId) ?? null;
  }

  getOwnershipMap(): Record<string, Owner> {
    const map: Record<string, Owner> = {};
    for (const lot of this.lots) {
      map[lot.lotId] = this.getOwner(lot.lotId);
    }
    return map;
  }

  getPurchases(): LotPurchaseRecord[] {
    return this.purchases.map(p => ({ ...p }));
  }

  getOutcome(): GameOutcome | null {
    return this.outcome;
  }

  reset(): void {
    this.ownership.clear();
    this.purchaseTicks.clear();
    for (const lot of this.lots) {
      this.ownership.set(lot.lotId, 'unowned');
    }
    this.purchases = [];
    this.playerIncomeBonus = 0;
    this.outcome = null;
  }

  private countOwnedBy(owner: Buyer): number {
    let count = 0;
    for (const value of this.ownership.values()) {
      if (value === owner) count++;
    }
    return count;
  }
}
