// ============================================
// VALLEY ECONOMY - Player-Facing Explanations
// ============================================

import type { CityLotDefinition, InvestmentDefinition, RiskLevel, RivalConfig } from '../models/types.js';
import { compoundingAdvantage, futureValue, projectedValue, yearsToDouble } from './compound.calculator.js';

const RISK_DESCRIPTIONS: Record<RiskLevel, string> = {
  low: 'very safe but grows slowly',
  medium: 'moderately risky with better potential returns',
  high: 'risky, it could gain a lot or lose money',
};

export function explainInvestment(definition: InvestmentDefinition): string {
  return `${definition.displayName}: ${definition.description}\n` +
    `This investment is ${RISK_DESCRIPTIONS[definition.riskLevel]}.\n` +
    `Expected return: ~${(definition.annualReturnRate * 100).toFixed(1)}% per year.`;
}

/** Ticks of income bonus needed to earn back the lot's cost; 0 without a bonus. */
export function paybackTicks(lot: CityLotDefinition): number {
  return lot.incomeBonus > 0 ? Math.ceil(lot.baseCost / lot.incomeBonus) : 0;
}

export function explainLotPurchase(lot: CityLotDefinition, playerBalance: number): string {
  const affordText = playerBalance >= lot.baseCost
    ? 'You can afford this!'
    : `You need $${(lot.baseCost - playerBalance).toFixed(0)} more.`;

  const bonusText = lot.incomeBonus > 0
    ? `Owning this gives you $${lot.incomeBonus.toFixed(0)} extra per tick.\n` +
      `It will pay for itself in ~${paybackTicks(lot)} ticks.`
    : 'This lot has no income bonus.';

  return `${lot.displayName} - $${lot.baseCost.toFixed(0)}\n${affordText}\n${bonusText}`;
}

export interface UpgradeOutlook {
  incomePerTick: number;
  nextIncomePerTick: number | null;
  upgradeCost: number | null;
}

export function explainRestaurantUpgrade(outlook: UpgradeOutlook): string {
  const { incomePerTick, nextIncomePerTick, upgradeCost } = outlook;
  if (upgradeCost === null || nextIncomePerTick === null) {
    return 'Your restaurant is at maximum level!';
  }

  const gain = nextIncomePerTick - incomePerTick;
  const lines = [
    `Upgrade cost: $${upgradeCost.toFixed(0)}`,
    `Income increase: $${incomePerTick.toFixed(0)} → $${nextIncomePerTick.toFixed(0)} per tick`,
  ];
  if (gain > 0) {
    lines.push(
      `Payback period: ~${Math.ceil(upgradeCost / gain)} ticks`,
      `After payback, you'll earn $${gain.toFixed(0)} extra every tick!`
    );
  }
  return lines.join('\n');
}

export function explainRival(config: RivalConfig): string {
  return [
    `Your rival earns $${config.incomePerTick.toFixed(0)} per tick.`,
    `They attempt to buy a lot every ~${config.purchaseIntervalTicks} ticks.`,
    config.scaleByProgress ? "As they get stronger, they'll buy faster!" : 'They keep the same pace all game.',
    config.warningTicks > 0
      ? `You'll get a ${config.warningTicks}-tick warning before they purchase.`
      : 'They buy without warning.',
  ].join('\n');
}

/**
 * One year of compounding against simple interest, with the rule-of-72
 * doubling time.
 */
export function explainCompoundInterest(principal: number, annualRate: number, compoundsPerYear: number, years = 1): string {
  const value = futureValue(principal, annualRate, compoundsPerYear, years);
  const advantage = compoundingAdvantage(principal, annualRate, compoundsPerYear, years);

  return [
    `Starting with $${principal.toFixed(0)} at ${(annualRate * 100).toFixed(1)}% annual interest:`,
    `After ${years} year(s), you'll have: $${value.toFixed(2)}`,
    `Total earned: $${(value - principal).toFixed(2)}`,
    `Compounding ${compoundsPerYear}x per year earns you $${advantage.toFixed(2)} more than simple interest would!`,
    annualRate > 0
      ? `At this rate, your money doubles in ~${yearsToDouble(annualRate).toFixed(1)} years.`
      : 'At 0% your money never grows.',
  ].join('\n');
}

export function explainInvestmentVsSaving(definition: InvestmentDefinition, amount: number, ticks: number): string {
  const value = projectedValue(definition, amount, ticks);

  return [
    `If you invest $${amount.toFixed(0)} in ${definition.displayName}:`,
    `• After ${ticks} ticks: ~$${value.toFixed(0)}`,
    `• Potential gain: ~$${(value - amount).toFixed(0)}`,
    '',
    `If you keep $${amount.toFixed(0)} in your wallet:`,
    `• After ${ticks} ticks: $${amount.toFixed(0)}`,
    '• Gain: $0',
    '',
    "The trade-off: Invested money is locked up and can't buy lots immediately.",
    '',
    explainCompoundInterest(amount, definition.annualReturnRate, definition.compoundsPerYear),
  ].join('\n');
}
