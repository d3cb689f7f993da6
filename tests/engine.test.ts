// ============================================
// VALLEY ECONOMY - Simulation Engine Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SimulationEngine } from '../src/simulation/engine.js';
import { GAME_EVENT_NAMES, type GameEventName } from '../src/simulation/events.js';
import { buildTestConfig } from './fixtures.js';

/** One lot the rival can afford on its first attempt at tick 10. */
function losingConfig() {
  return buildTestConfig({
    lots: [{ displayName: 'Only Lot', baseCost: 100, incomeBonus: 0 }],
    rival: {
      startingMoney: 1000,
      incomePerTick: 1,
      purchaseIntervalTicks: 10,
      warningTicks: 5,
      purchaseBuffer: 0,
      aggressionCurve: [
        { progress: 0, multiplier: 1 },
        { progress: 1, multiplier: 1 },
      ],
      minimumIntervalTicks: 1,
    },
  });
}

function recordEvents(engine: SimulationEngine): GameEventName[] {
  const seen: GameEventName[] = [];
  for (const event of GAME_EVENT_NAMES) {
    engine.bus.on(event, () => seen.push(event));
  }
  return seen;
}

describe('SimulationEngine', () => {
  let engine: SimulationEngine;

  beforeEach(() => {
    engine = new SimulationEngine({ config: buildTestConfig(), seed: 42 });
  });

  afterEach(() => {
    engine.stop();
  });

  describe('before a game starts', () => {
    it('should not tick', () => {
      expect(engine.tick()).toBe(false);
      expect(engine.getCurrentTick()).toBe(0);
    });

    it('should reject player actions', () => {
      const result = engine.buyLot('corner_shop');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.reason).toBe('game_not_active');
        expect(result.error).toBe('No game in progress (state: not_started)');
      }
    });
  });

  describe('newGame', () => {
    it('should start playing from the configured balance', () => {
      const started: number[] = [];
      engine.bus.on('game_started', e => started.push(e.startingBalance));

      engine.newGame();

      expect(engine.getStatus()).toEqual({ state: 'playing', tick: 0, running: false, speed: 1, seed: 42 });
      expect(engine.getEconomy().balance).toBe(1000);
      expect(started).toEqual([1000]);
    });

    it('should describe the rival at the start of a game', () => {
      engine.newGame();

      expect(engine.getRival()).toEqual({
        balance: 0,
        incomePerTick: 1,
        aggressionMultiplier: 1,
        effectiveInterval: 60,
        ticksUntilAttempt: 60,
        targetLotId: null,
        lotsOwned: 0,
        purchasesMade: 0,
      });
    });
  });

  describe('tick', () => {
    beforeEach(() => {
      engine.newGame();
    });

    it('should pay restaurant income every tick', () => {
      expect(engine.advance(10)).toBe(10);

      expect(engine.getEconomy().balance).toBe(1100);
      expect(engine.getEconomy().restaurant.totalEarned).toBe(100);
    });

    it('should sample wealth on the history interval', () => {
      engine.advance(10);

      expect(engine.getHistory()).toEqual([
        { tick: 5, totalWealth: 1050, netGain: 50 },
        { tick: 10, totalWealth: 1100, netGain: 100 },
      ]);
    });

    it('should add lot income once a lot is owned', () => {
      engine.buyLot('corner_shop');
      engine.advance(1);

      expect(engine.getEconomy().balance).toBe(612);
      expect(engine.getEconomy().lotIncomePerTick).toBe(2);
    });
  });

  describe('player actions', () => {
    beforeEach(() => {
      engine.newGame();
    });

    it('should open an investment from the player balance', () => {
      const result = engine.openInvestment('savings_bond', 500);

      expect(result.success).toBe(true);
      expect(engine.getEconomy().balance).toBe(500);
      expect(engine.getNetWorth()).toBe(1000);
      expect(engine.getPortfolio().positions).toHaveLength(1);
      expect(engine.getPortfolio().positions[0]?.displayName).toBe('Savings Bond');
    });

    it('should upgrade the restaurant', () => {
      const result = engine.upgradeRestaurant();

      expect(result).toEqual({ success: true, value: 2 });
      expect(engine.getEconomy().balance).toBe(500);
      expect(engine.getEconomy().restaurant.incomePerTick).toBe(15);
      expect(engine.getEconomy().restaurant.upgradeCost).toBe(1500);
    });
  });

  describe('winning', () => {
    beforeEach(() => {
      engine.newGame();
      engine.buyLot('corner_shop');
      engine.buyLot('river_lot');
    });

    it('should end the game when the player owns every lot', () => {
      expect(engine.getState()).toBe('won');
      expect(engine.isActive()).toBe(false);
      expect(engine.getEconomy().balance).toBe(0);
    });

    it('should produce a frozen summary', () => {
      const summary = engine.getSummary();

      expect(summary).not.toBeNull();
      expect(summary?.outcome).toBe('won');
      expect(summary?.lots.totalSpentByPlayer).toBe(1000);
      expect(summary?.reflections.headline).toBe('Speed Run!');
      expect(Object.isFrozen(summary)).toBe(true);
      expect(Object.isFrozen(summary?.keyDecisions)).toBe(true);
    });

    it('should stop ticking and refuse actions', () => {
      expect(engine.advance(5)).toBe(0);
      expect(engine.getCurrentTick()).toBe(0);

      const result = engine.upgradeRestaurant();
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error).toBe('No game in progress (state: won)');
    });
  });

  describe('losing', () => {
    beforeEach(() => {
      engine = new SimulationEngine({ config: losingConfig(), seed: 42 });
      engine.newGame();
    });

    it('should end on the tick the rival takes the last lot', () => {
      expect(engine.advance(100)).toBe(10);
      expect(engine.getState()).toBe('lost');
      expect(engine.getLots()[0]).toMatchObject({ lotId: 'only_lot', owner: 'rival', purchasedAtTick: 10 });
    });

    it('should warn before the rival buys', () => {
      const warnings: Array<{ ticksRemaining: number; targetLotId: string | null }> = [];
      engine.bus.on('rival_warning', e => warnings.push(e));

      engine.advance(100);

      expect(warnings).toEqual([{ ticksRemaining: 5, targetLotId: 'only_lot' }]);
    });

    it('should emit the final tick after the game ends', () => {
      engine.advance(9);
      const seen = recordEvents(engine);

      engine.advance(1);

      expect(seen).toEqual(['balance_changed', 'income_generated', 'ownership_changed', 'game_ended', 'tick']);
    });

    it('should summarize the loss', () => {
      engine.advance(100);
      const summary = engine.getSummary();

      expect(summary?.ticksPlayed).toBe(10);
      expect(summary?.finalBalance).toBe(1100);
      expect(summary?.rival).toEqual({ balance: 910, lotsOwned: 1 });
      expect(summary?.reflections.headline).toBe('Try Investing Next Time!');
    });
  });

  describe('reset', () => {
    it('should return to the pre-game state', () => {
      engine.newGame();
      engine.buyLot('corner_shop');
      engine.advance(12);

      engine.reset();

      expect(engine.getStatus()).toEqual({ state: 'not_started', tick: 0, running: false, speed: 1, seed: 42 });
      expect(engine.getEconomy().balance).toBe(1000);
      expect(engine.getLots().every(lot => lot.owner === 'unowned')).toBe(true);
      expect(engine.getHistory()).toEqual([]);
      expect(engine.getSummary()).toBeNull();
    });
  });

  describe('determinism', () => {
    function playFund(seed: number): number {
      const run = new SimulationEngine({ config: buildTestConfig(), seed });
      run.newGame();
      run.openInvestment('index_fund', 500);
      run.advance(30);
      return run.getPortfolio().totals.totalValue;
    }

    it('should replay volatile returns for the same seed', () => {
      expect(playFund(7)).toBe(playFund(7));
    });

    it('should restart the sequence on every new game', () => {
      engine.newGame(7);
      engine.openInvestment('index_fund', 500);
      engine.advance(30);
      const first = engine.getPortfolio().totals.totalValue;

      engine.newGame();
      engine.openInvestment('index_fund', 500);
      engine.advance(30);

      expect(engine.getStatus().seed).toBe(7);
      expect(engine.getPortfolio().totals.totalValue).toBe(first);
    });
  });

  describe('real-time loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      engine = new SimulationEngine({ config: buildTestConfig(), seed: 42, tickIntervalMs: 1000 });
    });

    afterEach(() => {
      engine.stop();
      vi.useRealTimers();
    });

    it('should not run without a game', () => {
      engine.start();

      expect(engine.isRunning()).toBe(false);
    });

    it('should tick on the interval', () => {
      engine.newGame();
      engine.start();

      vi.advanceTimersByTime(3000);

      expect(engine.getCurrentTick()).toBe(3);
      expect(engine.isRunning()).toBe(true);
    });

    it('should hold still while paused and continue on resume', () => {
      engine.newGame();
      engine.start();
      vi.advanceTimersByTime(3000);

      expect(engine.pause()).toBe(true);
      expect(engine.getState()).toBe('paused');
      vi.advanceTimersByTime(5000);
      expect(engine.getCurrentTick()).toBe(3);

      expect(engine.resume()).toBe(true);
      vi.advanceTimersByTime(2000);
      expect(engine.getCurrentTick()).toBe(5);
    });

    it('should emit started and stopped', () => {
      const lifecycle: string[] = [];
      engine.on('started', () => lifecycle.push('started'));
      engine.on('stopped', () => lifecycle.push('stopped'));

      engine.newGame();
      engine.start();
      engine.stop();

      expect(lifecycle).toEqual(['started', 'stopped']);
    });

    it('should reschedule the loop when the speed changes', () => {
      const speeds: number[] = [];
      engine.bus.on('speed_changed', e => speeds.push(e.speed));
      engine.newGame();
      engine.start();
      vi.advanceTimersByTime(2000);

      engine.setSpeed(2);
      vi.advanceTimersByTime(2000);
      expect(engine.getCurrentTick()).toBe(6);

      engine.setSpeed(4);
      vi.advanceTimersByTime(1000);
      expect(engine.getCurrentTick()).toBe(10);
      expect(speeds).toEqual([2, 4]);
    });

    it('should pause at speed 0 and restart at 1x', () => {
      const speeds: number[] = [];
      engine.bus.on('speed_changed', e => speeds.push(e.speed));
      engine.newGame();
      engine.start();
      vi.advanceTimersByTime(1000);

      engine.setSpeed(0);
      expect(engine.getState()).toBe('paused');
      expect(engine.isRunning()).toBe(false);
      vi.advanceTimersByTime(5000);
      expect(engine.getCurrentTick()).toBe(1);

      engine.start();
      vi.advanceTimersByTime(1000);
      expect(engine.getCurrentTick()).toBe(2);
      expect(speeds).toEqual([0, 1]);
      expect(engine.getSpeed()).toBe(1);
    });

    it('should keep a speed chosen before the loop starts', () => {
      engine.newGame();
      engine.setSpeed(4);
      engine.start();

      vi.advanceTimersByTime(1000);

      expect(engine.getCurrentTick()).toBe(4);
      expect(engine.getStatus().speed).toBe(4);
    });

    it('should ignore a change to the current speed', () => {
      const speeds: number[] = [];
      engine.bus.on('speed_changed', e => speeds.push(e.speed));

      engine.setSpeed(1);

      expect(speeds).toEqual([]);
    });
  });
});
