/**
 * Own-key access for document records keyed by user-supplied names.
 *
 * Property, scope and example names come straight from annotations and
 * source declarations, so `__proto__`, `constructor` or `toString` are
 * ordinary keys here and must never reach `Object.prototype`.
 *
 * @module
 */

/** Whether `key` is an own entry of `target` */
export function hasEntry<V>(target: Readonly<Record<string, V>>, key: string): boolean {
    return Object.hasOwn(target, key);
}

/** Own entry of `target`, ignoring anything inherited */
export function getEntry<V>(target: Readonly<Record<string, V>>, key: string): V | undefined {
    return Object.hasOwn(target, key) ? target[key] : undefined;
}

/** Define an own enumerable entry, including for `__proto__` */
export function setEntry<V>(target: Record<string, V>, key: string, value: V): void {
    Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}
