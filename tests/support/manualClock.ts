import type { Clock } from '../../src/domain/clock.js';

/** テストから進める時計。tick と壁時計は同じだけ進む。 */
export class ManualClock implements Clock {
  #tick = 0;
  #wall: number;

  constructor(startedAt = '2025-01-01T00:00:00.000Z') {
    this.#wall = Date.parse(startedAt);
  }

  now(): number {
    return this.#tick;
  }

  wallTime(): Date {
    return new Date(this.#wall);
  }

  advance(ms: number): void {
    this.#tick += ms;
    this.#wall += ms;
  }

  /** 壁時計だけを動かす（NTP による補正など）。tick は変わらない。 */
  shiftWall(ms: number): void {
    this.#wall += ms;
  }

  /** 単調性が壊れた時計を再現する。 */
  rewind(ms: number): void {
    this.#tick -= ms;
  }
}
