// ============================================
// VALLEY ECONOMY - Economy Operation Results
// ============================================
// Expected, recoverable failures are returned as values. A failed
// operation leaves every component untouched.

export type EconomyFailureReason =
  | 'insufficient_funds'
  | 'invalid_amount'
  | 'at_max_level'
  | 'lot_already_owned'
  | 'position_not_found'
  | 'lot_not_found'
  | 'definition_not_found'
  | 'game_not_active';

export interface EconomyFailure {
  success: false;
  reason: EconomyFailureReason;
  error: string;
}

export interface EconomySuccess<T> {
  success: true;
  value: T;
}

export type EconomyResult<T> = EconomySuccess<T> | EconomyFailure;

export function ok<T>(value: T): EconomySuccess<T> {
  return { success: true, value };
}

export function fail(reason: EconomyFailureReason, error: string): EconomyFailure {
  return { success: false, reason, error };
}

export function isPositiveAmount(amount: number): boolean {
  return Number.isFinite(amount) && amount > 0;
}

/** Currency formatting used in log lines and player-facing text. */
export function formatMoney(amount: number, fractionDigits = 2): string {
  return `$${amount.toFixed(fractionDigits)}`;
}
