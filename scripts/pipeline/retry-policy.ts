export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryBudget {
  /** Failures tolerated before `exhausted` is thrown. */
  maxRetries: number;
  delayMs: (retry: number) => number;
  exhausted: (error: unknown, failures: number) => Error;
}

/**
 * Failures are sorted into named budgets by `classify`; `null` means the error
 * is fatal and is rethrown untouched.
 */
export interface RetryPolicy<K extends string> {
  classify: (error: unknown) => K | null;
  budgets: Record<K, RetryBudget>;
}

export interface RetryAttempt<K extends string> {
  attempt: number;
  failures: ReadonlyMap<K, number>;
  /** Called by the operation once it makes progress. */
  resetFailures: () => void;
}

export interface RetryEvent<K extends string> {
  kind: K;
  retry: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions<K extends string> {
  sleep?: Sleeper;
  onRetry?: (event: RetryEvent<K>) => void;
}

export async function withRetry<T, K extends string>(
  operation: (attempt: RetryAttempt<K>) => Promise<T>,
  policy: RetryPolicy<K>,
  options: RetryOptions<K> = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const failures = new Map<K, number>();
  const resetFailures = () => failures.clear();

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation({ attempt, failures, resetFailures });
    } catch (error) {
      const kind = policy.classify(error);
      if (kind === null) throw error;

      const budget = policy.budgets[kind];
      const count = (failures.get(kind) ?? 0) + 1;
      failures.set(kind, count);

      if (count > budget.maxRetries) {
        throw budget.exhausted(error, count);
      }

      const delayMs = budget.delayMs(count);
      options.onRetry?.({ kind, retry: count, maxRetries: budget.maxRetries, delayMs, error });
      if (delayMs > 0) await wait(delayMs);
    }
  }
}
