export type Jitter = 'none' | 'full' | 'equal';

export interface BackoffOptions {
  /** Delay before the first retry, before jitter. @default 1000 */
  baseMs?: number;
  /** Upper bound for any delay. @default 60000 */
  maxMs?: number;
  /** @default 2 */
  factor?: number;
  /** @default 'full' */
  jitter?: Jitter;
  random?: () => number;
}

/**
 * Exponential backoff as an explicit state machine: each `next()` consumes one
 * attempt, `reset()` returns to the first one after a success.
 */
export class Backoff {
  readonly #baseMs: number;
  readonly #maxMs: number;
  readonly #factor: number;
  readonly #jitter: Jitter;
  readonly #random: () => number;
  #attempt = 0;

  constructor(options: BackoffOptions = {}) {
    this.#baseMs = options.baseMs ?? 1000;
    this.#maxMs = options.maxMs ?? 60_000;
    this.#factor = options.factor ?? 2;
    this.#jitter = options.jitter ?? 'full';
    this.#random = options.random ?? Math.random;
  }

  /** Attempts consumed since the last reset. */
  get attempt(): number {
    return this.#attempt;
  }

  next(): number {
    const ceiling = Math.min(this.#maxMs, this.#baseMs * this.#factor ** this.#attempt);
    this.#attempt++;
    switch (this.#jitter) {
      case 'none':
        return ceiling;
      case 'equal':
        return Math.floor(ceiling / 2 + this.#random() * (ceiling / 2));
      case 'full':
        return Math.floor(this.#random() * ceiling);
    }
  }

  reset(): void {
    this.#attempt = 0;
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
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
