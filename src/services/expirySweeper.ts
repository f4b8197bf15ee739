import type { Logger } from 'pino';

import type { SessionManager, SweepResult } from './sessionManager.js';

interface ExpirySweeperOptions {
  readonly sessions: Pick<SessionManager, 'sweepExpired'>;
  readonly intervalMs: number;
  readonly logger: Logger;
}

export class ExpirySweeper {
  #timer: ReturnType<typeof setInterval> | null = null;
  #running: Promise<SweepResult> | null = null;
  readonly #sessions: ExpirySweeperOptions['sessions'];
  readonly #intervalMs: number;
  readonly #logger: Logger;

  constructor(options: ExpirySweeperOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error('Sweep interval must be positive');
    }
    this.#sessions = options.sessions;
    this.#intervalMs = options.intervalMs;
    this.#logger = options.logger;
  }

  get isRunning(): boolean {
    return this.#timer !== null;
  }

  start(): void {
    if (this.#timer) return;
    this.#timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        this.#logger.error({
          msg: 'expiry sweep failed',
          cause: error instanceof Error ? error.message : error
        });
      });
    }, this.#intervalMs);
    this.#timer.unref();
    this.#logger.info({ msg: 'expiry sweeper started', intervalMs: this.#intervalMs });
  }

  stop(): void {
    if (!this.#timer) return;
    clearInterval(this.#timer);
    this.#timer = null;
  }

  /** 前回の掃除がまだ終わっていなければ、その結果を待って返す。 */
  async runOnce(): Promise<SweepResult> {
    if (this.#running) {
      return this.#running;
    }
    this.#running = this.#sessions.sweepExpired();
    try {
      return await this.#running;
    } finally {
      this.#running = null;
    }
  }
}
