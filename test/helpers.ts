/**
 * Shared test helpers
 */

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

/**
 * Run `fn` and return the error it throws, checking its class
 */
export function thrown<E extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => E
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
