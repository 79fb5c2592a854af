export class SpendCounterCorruptError extends Error {
  public readonly location: string;
  public readonly raw: string;

  constructor(location: string, raw: string) {
    super(`Spend counter at ${location} does not hold a non-negative integer`);
    this.name = 'SpendCounterCorruptError';
    this.location = location;
    this.raw = raw;
  }
}

export interface SpendStore {
  /** Human-readable location of the counter, used in log lines. */
  readonly location: string;
  /**
   * Returns the persisted total, or null when nothing has been stored yet.
   * Throws when the storage cannot be read or holds something other than a
   * non-negative integer.
   */
  read(): Promise<number | null>;
  /**
   * Persists the new running total and resolves with the total the store now
   * holds. A store shared between writers may return more than `used`.
   */
  write(used: number, delta: number): Promise<number>;
}
