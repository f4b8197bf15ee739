import { performance } from 'node:perf_hooks';

/**
 * 経過時間の計測には now()（単調増加）、記録の表示には wallTime() を使う。
 */
export interface Clock {
  now(): number;
  wallTime(): Date;
}

export function createMonotonicClock(): Clock {
  let last = 0;
  return {
    now() {
      last = Math.max(last, performance.now());
      return last;
    },
    wallTime() {
      return new Date();
    }
  };
}
