// ============================================
// VALLEY ECONOMY - Compound Interest Calculator
// ============================================
// Pure projection maths. Used for explanations and previews only;
// settlement always goes through InvestmentBook.

import type { InvestmentDefinition } from '../models/types.js';

export function ratePerPeriod(definition: InvestmentDefinition): number {
  return definition.annualReturnRate / definition.compoundsPerYear;
}

/**
 * Deterministic value of `principal` after `ticks`, volatility fixed at 1.
 * Only whole compounding periods count.
 */
export function projectedValue(definition: InvestmentDefinition, principal: number, ticks: number): number {
  const periods = Math.floor(Math.max(0, ticks) / definition.compoundingFrequencyTicks);
  if (periods === 0) return principal;
  return principal * Math.pow(1 + ratePerPeriod(definition), periods);
}

/**
 * FV = P × (1 + r/n)^(n×t)
 */
export function futureValue(principal: number, annualRate: number, compoundsPerYear: number, years: number): number {
  if (principal <= 0 || compoundsPerYear <= 0) return principal;
  return principal * Math.pow(1 + annualRate / compoundsPerYear, compoundsPerYear * years);
}

/** Rule of 72 approximation. */
export function yearsToDouble(annualRate: number): number {
  if (annualRate <= 0) return Number.POSITIVE_INFINITY;
  return 72 / (annualRate * 100);
}

/**
 * Extra money compounding earns over simple interest for the same period.
 */
export function compoundingAdvantage(principal: number, annualRate: number, compoundsPerYear: number, years: number): number {
  const simpleTotal = principal + principal * annualRate * years;
  return futureValue(principal, annualRate, compoundsPerYear, years) - simpleTotal;
}
