// ============================================
// VALLEY ECONOMY - Freeze Helper
// ============================================

/**
 * Recursively freeze an object graph in place and return it.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
