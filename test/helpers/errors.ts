type ErrorClass<E extends Error> = new (...args: never[]) => E;

/**
 * Run `fn` and return the error it throws, failing unless it is an instance of `ctor`.
 */
export function captureError<E extends Error>(fn: () => unknown, ctor: ErrorClass<E>): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof ctor) return err;
    throw err;
  }
  throw new Error(`Expected ${ctor.name} to be thrown`);
}

export async function captureRejection<E extends Error>(
  promise: Promise<unknown>,
  ctor: ErrorClass<E>,
): Promise<E> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ctor) return err;
    throw err;
  }
  throw new Error(`Expected ${ctor.name} to be thrown`);
}
