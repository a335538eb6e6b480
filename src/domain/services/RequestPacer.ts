/**
 * Request Pacer
 *
 * Fixed-rate throttle for outbound AI calls: a call starts no sooner than
 * `minIntervalMs` after the previous call finished, whether that call
 * succeeded or threw.
 */

export const DEFAULT_REQUEST_INTERVAL_MS = 1500;

export interface RequestPacerConfig {
  minIntervalMs: number;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

const DEFAULT_CONFIG: RequestPacerConfig = {
  minIntervalMs: DEFAULT_REQUEST_INTERVAL_MS,
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RequestPacer {
  private config: RequestPacerConfig;
  private lastFinishedAt: number | null = null;

  constructor(config: Partial<RequestPacerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async run<T>(call: () => Promise<T>): Promise<T> {
    if (this.lastFinishedAt !== null) {
      const waitMs = this.lastFinishedAt + this.config.minIntervalMs - this.config.now();
      if (waitMs > 0) {
        await this.config.sleep(waitMs);
      }
    }

    try {
      return await call();
    } finally {
      this.lastFinishedAt = this.config.now();
    }
  }
}
