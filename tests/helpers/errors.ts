/** Run fn, assert it throws an instance of type, and return the error. */
export function expectThrown<E extends Error>(
  fn: () => unknown,
  type: abstract new (...args: never[]) => E,
): E {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(type);
    if (err instanceof type) return err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}

/** Await promise, assert it rejects with an instance of type, and return the error. */
export async function expectRejected<E extends Error>(
  promise: Promise<unknown>,
  type: abstract new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (err) {
    expect(err).toBeInstanceOf(type);
    if (err instanceof type) return err;
  }
  throw new Error(`expected ${type.name} to be rejected`);
}
