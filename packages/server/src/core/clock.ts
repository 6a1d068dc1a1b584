import { addMilliseconds } from 'date-fns';

export interface ClockSource {
  now(): Date;
  /** Resolves after `ms`, or early when `signal` aborts. Never rejects. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements ClockSource {
  now(): Date {
    return new Date();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve();
    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Virtual clock: `sleep` advances time instantly. Used for dry runs and tests.
 */
export class ManualClock implements ClockSource {
  private current: Date;
  readonly sleeps: number[] = [];

  constructor(start: Date) {
    this.current = start;
  }

  now(): Date {
    return this.current;
  }

  set(at: Date): void {
    this.current = at;
  }

  advance(ms: number): void {
    this.current = addMilliseconds(this.current, ms);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.advance(ms);
  }
}

/**
 * Reads time from another source (typically a broker) and sleeps on the system timer.
 */
export class DelegatingClock implements ClockSource {
  private readonly timer = new SystemClock();

  constructor(private source: { now(): Date }) {}

  now(): Date {
    return this.source.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return this.timer.sleep(ms, signal);
  }
}
