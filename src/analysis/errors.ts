export class CalloutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CalloutError";
  }
}

/** A caller passed an operator, column or window the engine cannot use. */
export class InvalidArgumentError extends CalloutError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/** A deviation check ran before rolling stats were computed for its metric. */
export class StatsNotComputedError extends CalloutError {
  constructor(public readonly metric: string) {
    super(
      `Rolling stats not computed for "${metric}". ` +
        `Call computeRollingStats(store, "${metric}") first.`,
    );
    this.name = "StatsNotComputedError";
  }
}
