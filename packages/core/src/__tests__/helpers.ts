/**
 * Run `fn` and return the error it throws, which must be an instance of `type`.
 */
export function catchError<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}

/**
 * Async variant of catchError.
 */
export async function catchErrorAsync<T extends Error>(
  fn: () => Promise<unknown>,
  type: new (...args: never[]) => T
): Promise<T> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
