import type { SpendStore } from '../ports/SpendStore';
import type { JobLogger } from '../ports/JobEnvironment';
import { describeError } from '../domain/errors';

export type SpendLoadResult =
  | { source: 'fresh'; used: 0 }
  | { source: 'persisted'; used: number }
  | { source: 'defaulted'; used: 0; error: unknown };

export type SpendRecordResult =
  | { status: 'saved'; used: number }
  | { status: 'failed'; used: number; error: unknown };

export class InvalidSpendAmountError extends Error {
  public readonly amount: number;

  constructor(amount: number) {
    super(`Spend amount must be a non-negative integer, got ${amount}`);
    this.name = 'InvalidSpendAmountError';
    this.amount = amount;
  }
}

/**
 * Persisted, ceiling-bound counter of a paid external resource.
 *
 * Callers check `canSpend` immediately before each unit of spend and record it
 * with `add` right after. The gate never refuses an `add`; keeping `used`
 * under the ceiling is the caller's side of the contract.
 *
 * Storage is read once in `load` and written after every `add` without any
 * locking. With a last-write-wins store such as a plain file this is only
 * correct while a single process writes the counter at a time.
 */
export class SpendGate {
  private current = 0;

  constructor(
    private readonly store: SpendStore,
    public readonly ceiling: number,
    private readonly logger?: Pick<JobLogger, 'warn'>
  ) {
    assertAmount(ceiling);
  }

  get used(): number {
    return this.current;
  }

  async load(): Promise<SpendLoadResult> {
    let persisted: number | null;
    try {
      persisted = await this.store.read();
    } catch (error) {
      this.current = 0;
      this.logger?.warn('Spend counter unreadable; resuming from zero', {
        location: this.store.location,
        error: describeError(error)
      });
      return { source: 'defaulted', used: 0, error };
    }

    if (persisted === null) {
      this.current = 0;
      return { source: 'fresh', used: 0 };
    }

    this.current = persisted;
    return { source: 'persisted', used: persisted };
  }

  canSpend(amount: number): boolean {
    assertAmount(amount);
    return this.current + amount <= this.ceiling;
  }

  /**
   * Records spend that already happened. A failed write leaves the in-memory
   * total advanced, so a crash right after it under-reports spend to the next
   * run; that risk is accepted.
   */
  async add(amount: number): Promise<SpendRecordResult> {
    assertAmount(amount);
    this.current += amount;

    try {
      const stored = await this.store.write(this.current, amount);
      this.current = Math.max(this.current, stored);
      return { status: 'saved', used: this.current };
    } catch (error) {
      this.logger?.warn('Failed to persist spend counter; continuing with in-memory total', {
        location: this.store.location,
        used: this.current,
        error: describeError(error)
      });
      return { status: 'failed', used: this.current, error };
    }
  }

  remaining(): number {
    return this.ceiling - this.current;
  }
}

function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new InvalidSpendAmountError(amount);
  }
}
