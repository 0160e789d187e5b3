/**
 * Clock interface for injectable time source.
 * Allows deterministic testing of timestamps and durations.
 */
export interface Clock {
  now(): Date;
}

/**
 * IdGenerator interface for injectable ID generation.
 */
export interface IdGenerator {
  /** Generate a unique identifier */
  generate(prefix?: string): string;
}

/**
 * Default clock implementation using system time.
 */
export const defaultClock: Clock = {
  now: () => new Date(),
};

/**
 * Default ID generator using timestamp + crypto random.
 */
export const defaultIdGenerator: IdGenerator = {
  generate: (prefix?: string) => {
    const timestamp = Date.now().toString(36);
    const random = globalThis.crypto.randomUUID().slice(0, 8);
    return prefix ? `${prefix}-${timestamp}-${random}` : `${timestamp}-${random}`;
  },
};

/**
 * Identity and timing of one batch run
 */
export class RunContext {
  readonly runId: string;
  readonly startedAt: Date;
  private readonly clock: Clock;

  constructor(init: { clock?: Clock; idGenerator?: IdGenerator; runId?: string } = {}) {
    this.clock = init.clock ?? defaultClock;
    this.runId = init.runId ?? (init.idGenerator ?? defaultIdGenerator).generate('run');
    this.startedAt = this.clock.now();
  }

  now(): Date {
    return this.clock.now();
  }

  timestamp(): string {
    return this.clock.now().toISOString();
  }

  /** Milliseconds since the run started */
  elapsedMs(): number {
    return this.clock.now().getTime() - this.startedAt.getTime();
  }
}
