// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Immutable Values
// ═══════════════════════════════════════════════════════════════

/** Freezes the value and everything reachable from it. Sets and Maps stay mutable. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
