// ============================================
// VALLEY ECONOMY - Rival Agent Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { RivalAgent, evaluateCurve } from '../src/simulation/rival.agent.js';
import { LotMarket } from '../src/simulation/lot-market.js';
import { Ledger } from '../src/simulation/ledger.js';
import { GameEventBus, type GameEventMap } from '../src/simulation/events.js';
import type { CityLotDefinition, RivalConfig } from '../src/models/types.js';
import { makeLot, makeRivalConfig } from './fixtures.js';

function createRival(lots: CityLotDefinition[], overrides: Partial<RivalConfig> = {}) {
  const bus = new GameEventBus();
  const market = new LotMarket(lots, bus);
  const rival = new RivalAgent(makeRivalConfig(overrides), market, bus);
  const warnings: GameEventMap['rival_warning'][] = [];
  const purchases: GameEventMap['ownership_changed'][] = [];
  bus.on('rival_warning', e => warnings.push(e));
  bus.on('ownership_changed', e => purchases.push(e));
  return { bus, market, rival, warnings, purchases };
}

function runTicks(rival: RivalAgent, from: number, to: number): void {
  for (let tick = from; tick <= to; tick++) rival.simulate(tick);
}

describe('evaluateCurve', () => {
  const curve = [
    { progress: 0, multiplier: 1 },
    { progress: 1, multiplier: 1.5 },
  ];

  it('should interpolate between keyframes', () => {
    expect(evaluateCurve(curve, 0.5)).toBe(1.25);
  });

  it('should clamp outside the keyframe range', () => {
    expect(evaluateCurve(curve, -1)).toBe(1);
    expect(evaluateCurve(curve, 2)).toBe(1.5);
  });

  it('should default to 1 without keyframes', () => {
    expect(evaluateCurve([], 0.3)).toBe(1);
  });

  it('should accept unsorted keyframes', () => {
    expect(evaluateCurve([{ progress: 1, multiplier: 3 }, { progress: 0, multiplier: 1 }], 0.5)).toBe(2);
  });
});

describe('RivalAgent', () => {
  const lots = [makeLot('cheap', 1000, 5), makeLot('pricey', 5000, 20)];

  describe('purchase scheduling', () => {
    let setup: ReturnType<typeof createRival>;

    beforeEach(() => {
      setup = createRival(lots);
    });

    it('should not buy at tick 60 with 980 against a 1100 requirement', () => {
      runTicks(setup.rival, 1, 60);

      expect(setup.rival.getBalance()).toBe(980);
      expect(setup.purchases).toHaveLength(0);
      expect(setup.rival.getTicksSincePurchaseAttempt()).toBe(0);
    });

    it('should buy the cheapest lot at tick 120 with 1460', () => {
      runTicks(setup.rival, 1, 120);

      expect(setup.purchases).toEqual([{ lotId: 'cheap', newOwner: 'rival', tick: 120 }]);
      expect(setup.rival.getBalance()).toBe(460);
      expect(setup.rival.getPurchasesMade()).toBe(1);
      expect(setup.market.getPlayerIncomeBonus()).toBe(0);
    });

    it('should warn once per cycle, warningTicks before the attempt', () => {
      runTicks(setup.rival, 1, 120);

      expect(setup.warnings).toEqual([
        { ticksRemaining: 30, targetLotId: 'cheap' },
        { ticksRemaining: 30, targetLotId: 'cheap' },
      ]);
    });

    it('should shorten the interval as it takes over the city', () => {
      runTicks(setup.rival, 1, 120);

      // progress 0.5 -> multiplier 1.25 -> 60 / 1.25
      expect(setup.rival.effectiveInterval()).toBe(48);
      expect(setup.rival.ticksUntilAttempt()).toBe(48);
    });
  });

  it('should never attempt before the effective interval', () => {
    const { rival, purchases } = createRival(lots, { startingMoney: 100000 });

    runTicks(rival, 1, 120);

    expect(purchases.map(p => p.tick)).toEqual([60, 108]);
  });

  it('should break cost ties by lot id', () => {
    const { rival, purchases } = createRival(
      [makeLot('b_lot', 1000), makeLot('a_lot', 1000), makeLot('z_big', 9000)],
      { startingMoney: 5000, purchaseIntervalTicks: 10, warningTicks: 0 }
    );

    runTicks(rival, 1, 10);

    expect(purchases.map(p => p.lotId)).toEqual(['a_lot']);
  });

  it('should not warn when warningTicks is 0', () => {
    const { rival, warnings } = createRival(lots, { warningTicks: 0 });

    runTicks(rival, 1, 120);

    expect(warnings).toHaveLength(0);
  });

  it('should name the cheapest lot when it cannot expect to afford any', () => {
    const { rival, warnings } = createRival(lots, { startingMoney: 0, incomePerTick: 1 });

    runTicks(rival, 1, 30);

    expect(warnings).toEqual([{ ticksRemaining: 30, targetLotId: 'cheap' }]);
  });

  describe('retargeting', () => {
    const race = [makeLot('a', 1000), makeLot('b', 1200)];

    function setupRace() {
      const setup = createRival(race);
      const player = new Ledger(setup.bus, 10000);
      const buy = (lotId: string, tick: number) => setup.market.attemptPurchase(lotId, 'player', player, { tick });
      return { ...setup, buy };
    }

    it('should announce a new target when the player buys the announced lot', () => {
      const { rival, warnings, buy } = setupRace();
      runTicks(rival, 1, 30);

      buy('a', 30);

      expect(warnings).toEqual([
        { ticksRemaining: 30, targetLotId: 'a' },
        { ticksRemaining: 30, targetLotId: 'b' },
      ]);
      expect(rival.getTargetLotId()).toBe('b');
    });

    it('should keep the new target for the rest of the cycle', () => {
      const { rival, warnings, buy } = setupRace();
      runTicks(rival, 1, 30);
      buy('a', 30);

      runTicks(rival, 31, 59);

      expect(warnings).toHaveLength(2);
      expect(warnings[1]?.targetLotId).toBe('b');
    });

    it('should clear the target when no lot is left', () => {
      const { rival, warnings, buy } = setupRace();
      buy('b', 0);
      runTicks(rival, 1, 30);

      buy('a', 30);

      expect(warnings).toEqual([
        { ticksRemaining: 30, targetLotId: 'a' },
        { ticksRemaining: 0, targetLotId: null },
      ]);
    });

    it('should stay quiet when the player buys a different lot', () => {
      const { rival, warnings, buy } = setupRace();
      runTicks(rival, 1, 30);

      buy('b', 30);

      expect(warnings).toEqual([{ ticksRemaining: 30, targetLotId: 'a' }]);
      expect(rival.getTargetLotId()).toBe('a');
    });

    it('should drop the target once the purchase attempt is made', () => {
      const { rival } = setupRace();

      runTicks(rival, 1, 60);

      expect(rival.getTargetLotId()).toBeNull();
    });
  });

  describe('effectiveInterval', () => {
    it('should use the authored interval verbatim when not scaling by progress', () => {
      const { rival } = createRival(lots, {
        scaleByProgress: false,
        aggressionCurve: [{ progress: 0, multiplier: 3 }],
      });

      expect(rival.effectiveInterval()).toBe(60);
    });

    it('should decrease strictly as the multiplier grows', () => {
      const intervals = [1, 1.5, 2].map(multiplier =>
        createRival(lots, { aggressionCurve: [{ progress: 0, multiplier }] }).rival.effectiveInterval()
      );

      expect(intervals).toEqual([60, 40, 30]);
    });

    it('should not go below the minimum interval', () => {
      const { rival } = createRival(lots, { aggressionCurve: [{ progress: 0, multiplier: 10 }] });

      expect(rival.effectiveInterval()).toBe(10);
    });
  });

  describe('funds', () => {
    it('should refuse to overspend its own balance', () => {
      const { rival } = createRival(lots);

      const result = rival.debit(600, 'lot');

      expect(result.success).toBe(false);
      if (!result.success) expect(result.reason).toBe('insufficient_funds');
      expect(rival.getBalance()).toBe(500);
    });

    it('should restore its starting state on reset', () => {
      const { rival } = createRival(lots);
      runTicks(rival, 1, 45);

      rival.reset();

      expect(rival.getBalance()).toBe(500);
      expect(rival.getTicksSincePurchaseAttempt()).toBe(0);
      expect(rival.getPurchasesMade()).toBe(0);
    });
  });
});
