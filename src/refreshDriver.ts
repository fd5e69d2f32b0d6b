import { createLogger } from "./logger.js";

const log = createLogger("refresh");

export const DEFAULT_REFRESH_INTERVAL_MS = 60_000;

export type DriverState = "idle" | "fetching";

export type CycleTask<T> = (cycle: number) => Promise<T>;

export type SnapshotListener<T> = (snapshot: T) => void;

// Runs a task on an interval; cycles never overlap and a trigger() supersedes the one in flight
export class RefreshDriver<T> {
  private currentState: DriverState = "idle";
  private running = false;
  private stale = false;
  private sequence = 0;
  private timer?: NodeJS.Timeout;
  private listeners: SnapshotListener<T>[] = [];
  private waiters: Array<() => void> = [];
  private latest?: T;
  private error?: unknown;

  constructor(
    private readonly task: CycleTask<T>,
    private readonly intervalMs: number = DEFAULT_REFRESH_INTERVAL_MS
  ) {}

  get state(): DriverState {
    return this.currentState;
  }

  get active(): boolean {
    return this.running;
  }

  get cycle(): number {
    return this.sequence;
  }

  get snapshot(): T | undefined {
    return this.latest;
  }

  // Error of the most recent completed cycle, cleared by the next success
  get lastError(): unknown {
    return this.error;
  }

  onSnapshot(listener: SnapshotListener<T>): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  start(): Promise<void> {
    if (this.running) {
      return this.trigger();
    }
    this.running = true;
    log.info(`Starting refresh loop every ${Math.round(this.intervalMs / 1000)}s`);
    return this.trigger();
  }

  stop(): void {
    this.running = false;
    this.clearTimer();
    this.releaseWaiters();
  }

  // Resolves once a cycle started after this call has settled
  trigger(): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }
    const settled = new Promise<void>(resolve => this.waiters.push(resolve));
    if (this.currentState === "fetching") {
      this.stale = true;
    } else {
      this.clearTimer();
      void this.runCycle();
    }
    return settled;
  }

  private async runCycle(): Promise<void> {
    this.currentState = "fetching";
    this.stale = false;
    const cycle = ++this.sequence;
    log.debug(`Cycle ${cycle} started`);

    let outcome: { ok: true; value: T } | { ok: false; error: unknown };
    try {
      outcome = { ok: true, value: await this.task(cycle) };
    } catch (error) {
      outcome = { ok: false, error };
    }
    this.currentState = "idle";

    if (!this.running) {
      this.releaseWaiters();
      return;
    }

    if (this.stale) {
      log.debug(`Cycle ${cycle} superseded, result discarded`);
      void this.runCycle();
      return;
    }

    if (outcome.ok) {
      this.error = undefined;
      this.apply(outcome.value);
    } else {
      this.error = outcome.error;
      log.error(`Cycle ${cycle} failed`, outcome.error);
    }

    this.releaseWaiters();
    this.schedule();
  }

  private apply(snapshot: T): void {
    this.latest = snapshot;
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        log.error("Snapshot listener failed", error);
      }
    }
  }

  private schedule(): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.runCycle();
    }, this.intervalMs);
    // The transport, not the timer, keeps the process alive
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private releaseWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(resolve => resolve());
  }
}
