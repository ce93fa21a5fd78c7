/**
 * Python-style context managers.
 *
 * `__enter__` acquires the resource; if it throws, the error propagates and
 * neither the body nor `__exit__` runs. Once entered, `__exit__` always runs after
 * the body, including when the body throws.
 */

export interface ContextManager {
  __enter__(): void;
  __exit__(): void;
}

export interface AsyncContextManager {
  __aenter__(): Promise<void>;
  __aexit__(): Promise<void>;
}

/**
 * @example
 * ```typescript
 * const total = withContext(new Transaction(db), (tx) => tx.sum('amount'));
 * ```
 */
export function withContext<R extends ContextManager, T>(
  resource: R,
  body: (resource: R) => T
): T {
  resource.__enter__();
  try {
    return body(resource);
  } finally {
    resource.__exit__();
  }
}

/**
 * @example
 * ```typescript
 * await asyncWithContext(new Connection(url), async (conn) => {
 *   await conn.send('ping');
 * });
 * ```
 */
export async function asyncWithContext<R extends AsyncContextManager, T>(
  resource: R,
  body: (resource: R) => Promise<T>
): Promise<T> {
  await resource.__aenter__();
  try {
    return await body(resource);
  } finally {
    await resource.__aexit__();
  }
}
