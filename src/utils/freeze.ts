/**
 * Freeze an object graph in place and return it.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Deep-frozen structured copy. Later changes to the source do not show through.
 */
export function frozenCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}
