export type ScopeExit = { failed: false } | { failed: true; error: unknown };

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Run `body` and call `release` exactly once when it is done.
 *
 * A returned promise is awaited before release, so async bodies are covered
 * for their whole lifetime. The body's own failure always propagates after
 * release; `release` must not throw on a failed exit.
 */
export function runScoped(
  body: () => unknown,
  release: (exit: ScopeExit) => void,
): unknown {
  let result: unknown;
  try {
    result = body();
  } catch (error) {
    release({ failed: true, error });
    throw error;
  }

  if (!isPromiseLike(result)) {
    release({ failed: false });
    return result;
  }

  return Promise.resolve(result).then(
    (value) => {
      release({ failed: false });
      return value;
    },
    (error: unknown) => {
      release({ failed: true, error });
      throw error;
    },
  );
}
