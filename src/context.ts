import { v4 as uuidv4 } from 'uuid';

/**
 * Per-run context shared by the harness, logger and errors.
 */

export class RunContext {
  readonly runId: string;
  readonly battery: string | null;

  constructor(runId: string, battery: string | null = null) {
    this.runId = runId;
    this.battery = battery;
  }

  /** Create a new top-level RunContext with a generated UUID v4 runId. */
  static create(): RunContext {
    return new RunContext(uuidv4());
  }

  /** Context for one battery within this run. */
  child(battery: string): RunContext {
    return new RunContext(this.runId, battery);
  }

  toJSON(): Record<string, unknown> {
    return {
      runId: this.runId,
      battery: this.battery,
    };
  }
}
