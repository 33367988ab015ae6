/**
 * Runs `run` and returns the error it throws, failing unless it is a `type`.
 */
export function catchError<E extends Error>(type: new (...args: never[]) => E, run: () => unknown): E {
  try {
    run()
  } catch (err) {
    if (err instanceof type) return err
    throw err
  }
  throw new Error(`expected ${type.name} to be thrown`)
}
