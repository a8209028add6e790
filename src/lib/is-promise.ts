/**
 * Thenable check that works across realms and for promise-like objects
 */
export function isPromise(value: unknown): value is PromiseLike<unknown> {
  if (
    value === null ||
    (typeof value !== 'object' && typeof value !== 'function')
  ) {
    return false;
  }

  return typeof Reflect.get(value, 'then') === 'function';
}
