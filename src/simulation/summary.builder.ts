// ============================================
// VALLEY ECONOMY - Game Summary Builder
// ============================================
// Builds the immutable end-of-game snapshot, the key decisions list and
// the plain-language learning reflections shown on the recap screen.

import type { GameSummary, LearningReflections } from '../models/types.js';
import { deepFreeze } from '../utils/freeze.js';

export const MAX_KEY_DECISIONS = 5;

/** Summary fields known before the narrative parts are written. */
export type SummaryFacts = Omit<GameSummary, 'keyDecisions' | 'reflections'>;

/** Whole-dollar amount with thousands separators, e.g. $1,234. */
export function formatDollars(amount: number): string {
  return `$${Math.round(amount).toLocaleString('en-US')}`;
}

// ============================================
// Key Decisions
// ============================================

export function buildKeyDecisions(facts: SummaryFacts): string[] {
  const decisions: string[] = [];
  const add = (text: string) => {
    if (decisions.length < MAX_KEY_DECISIONS) decisions.push(text);
  };

  const won = facts.outcome === 'won';
  const { totalGain, investmentCount, sellHistory } = facts.investments;

  if (totalGain > 500) {
    add(`Your ${formatDollars(totalGain)} in investment gains helped you win!`);
  } else if (totalGain > 100) {
    add(`Compound interest earned you ${formatDollars(totalGain)} this game.`);
  } else if (investmentCount > 0 && totalGain <= 0) {
    add(`Your investments lost ${formatDollars(-totalGain)}. Riskier assets can drop, bonds are more predictable.`);
  } else if (investmentCount === 0) {
    add("You didn't use investments. Compound interest could have helped!");
  }

  if (won && facts.ticksPlayed < 100) {
    add('Fast victory! Efficient use of resources.');
  } else if (!won && facts.ticksPlayed > 200) {
    add('The rival outpaced you over time.');
  }

  if (facts.lots.playerLots > 0 && facts.lots.rivalLots > facts.lots.playerLots) {
    add('The rival bought lots faster than you.');
  }

  if (sellHistory.length > 0) {
    const best = sellHistory.reduce((a, b) => (b.realizedGain > a.realizedGain ? b : a));
    if (best.realizedGain > 50) {
      add(
        `Best sell: ${best.displayName} on tick ${best.soldAtTick} ` +
        `(+${formatDollars(best.realizedGain)}, ${best.percentageReturn.toFixed(0)}%)`
      );
    }
  }

  return decisions;
}

// ============================================
// Learning Reflections
// ============================================

export function buildHeadline(facts: SummaryFacts): string {
  const { totalGain, investmentCount } = facts.investments;

  if (facts.outcome === 'won') {
    if (totalGain > 200) return 'Smart Investor!';
    if (facts.ticksPlayed < 80) return 'Speed Run!';
    return 'You Won!';
  }

  if (investmentCount === 0) return 'Try Investing Next Time!';
  if (facts.lots.rivalLots >= facts.lots.totalLots) return 'The Rival Was Too Fast!';
  return 'Keep Trying!';
}

export function buildInvestmentInsight(facts: SummaryFacts): string {
  const { totalGain, investmentCount, totalPrincipalInvested } = facts.investments;

  if (investmentCount === 0) {
    return "You didn't invest any money this game. " +
      'Even a safe bond at 5% would have turned $500 into $525 in 30 ticks. ' +
      'Try investing next time!';
  }

  if (totalGain > 0) {
    const returnPct = totalPrincipalInvested > 0 ? (totalGain / totalPrincipalInvested) * 100 : 0;
    return `Your investments earned ${formatDollars(totalGain)} ` +
      `(+${returnPct.toFixed(0)}%) over ${facts.ticksPlayed} ticks. ` +
      "That's compound interest at work!";
  }

  return `Your investments lost ${formatDollars(-totalGain)}. ` +
    'Higher risk means higher potential loss. ' +
    'Bonds are safer if you want steady growth.';
}

export function buildOpportunityCostInsight(facts: SummaryFacts): string {
  const first = facts.lots.purchases.find(p => p.owner === 'player');
  if (first) {
    const ticksOwned = facts.ticksPlayed - first.purchasedAtTick;
    const estimatedIncome = first.incomeBonus * ticksOwned;
    if (estimatedIncome > 0) {
      return `You bought ${first.displayName} on tick ${first.purchasedAtTick}. ` +
        `Its income bonus earned you ~${formatDollars(estimatedIncome)} over the game.`;
    }
  }

  if (facts.lots.totalSpentByPlayer > 0) {
    return `You spent ${formatDollars(facts.lots.totalSpentByPlayer)} on lots. ` +
      "Each dollar spent on a lot is a dollar you couldn't invest.";
  }

  return "You didn't buy any lots. Without lots, you can't win the race!";
}

export function buildWhatIfMessage(facts: SummaryFacts): string {
  const won = facts.outcome === 'won';
  const { totalGain, investmentCount } = facts.investments;

  if (won && investmentCount === 0) {
    return 'What if you had invested some money? ' +
      'You might have won even faster with compound interest on your side.';
  }
  if (!won && investmentCount === 0) {
    return 'What if you had put $500 into a bond early on? ' +
      'The extra earnings might have helped you buy that next lot before the rival.';
  }
  if (!won && totalGain > 0) {
    return 'Your investments were growing! ' +
      'What if you had invested earlier or with a larger amount?';
  }
  if (won && totalGain > 100) {
    return 'Your investments paid off! ' +
      'What if you had taken on even more risk? Would it have been worth it?';
  }
  return 'Every financial decision has a trade-off. ' +
    'Try a different strategy next time!';
}

export function buildReflections(facts: SummaryFacts): LearningReflections {
  return {
    headline: buildHeadline(facts),
    investmentInsight: buildInvestmentInsight(facts),
    opportunityCostInsight: buildOpportunityCostInsight(facts),
    whatIfMessage: buildWhatIfMessage(facts),
  };
}

// ============================================
// Snapshot
// ============================================

export function buildGameSummary(facts: SummaryFacts): GameSummary {
  return deepFreeze({
    ...facts,
    keyDecisions: buildKeyDecisions(facts),
    reflections: buildReflections(facts),
  });
}
