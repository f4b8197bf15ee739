import {
  accumulate,
  emptyAggregate,
  type LeaderboardEntry,
  type LeaderboardPage,
  paginate,
  rankAggregates,
  type UserAggregate
} from '../domain/leaderboard.js';
import { DEFAULT_TARGET_MS, type ScoreRecord } from '../domain/scoring.js';
import type { SessionRecordStore } from './gameStore.js';

/**
 * ユーザーごとの累積値を保持し、新しい採点結果が来るたびに差分だけを反映する。
 * 順位表は変更があった後の最初の読み出しでだけ並べ直す。
 *
 * 二重計上を防ぐため、反映済みの sessionId をすべて保持する（記録件数に比例してメモリを使う）。
 * リスナー経由とストアからの読み込みのどちらで先に届いても、同じ記録は一度しか数えない。
 */
export class LeaderboardAggregator {
  readonly #aggregates = new Map<string, UserAggregate>();
  readonly #seen = new Set<string>();
  #ranked: LeaderboardEntry[] | null = null;
  #hydration: Promise<void> | null = null;
  #pendingDuringRefresh: ScoreRecord[] | null = null;

  constructor(
    private readonly store: Pick<SessionRecordStore, 'loadScoreRecords'>,
    private readonly targetMs: number = DEFAULT_TARGET_MS
  ) {}

  record(record: ScoreRecord): void {
    this.#pendingDuringRefresh?.push(record);
    if (this.#seen.has(record.sessionId)) {
      return;
    }
    this.#seen.add(record.sessionId);
    const current = this.#aggregates.get(record.userId) ?? emptyAggregate(record.userId);
    this.#aggregates.set(record.userId, accumulate(current, record));
    this.#ranked = null;
  }

  async rank(limit: number, offset = 0): Promise<LeaderboardPage> {
    const ranked = await this.#ranking();
    return {
      entries: paginate(ranked, limit, offset),
      total: ranked.length
    };
  }

  async entryFor(userId: string): Promise<LeaderboardEntry | null> {
    const ranked = await this.#ranking();
    return ranked.find((entry) => entry.userId === userId) ?? null;
  }

  /** ストアから全件を読み直して累積値を作り直す。 */
  async refresh(): Promise<void> {
    const pending: ScoreRecord[] = [];
    this.#pendingDuringRefresh = pending;
    let records: ScoreRecord[];
    try {
      records = await this.store.loadScoreRecords();
    } finally {
      this.#pendingDuringRefresh = null;
    }
    this.#aggregates.clear();
    this.#seen.clear();
    for (const record of [...records, ...pending]) {
      this.record(record);
    }
    this.#ranked = null;
    this.#hydration = Promise.resolve();
  }

  async #ranking(): Promise<LeaderboardEntry[]> {
    await this.#hydrate();
    if (!this.#ranked) {
      this.#ranked = rankAggregates(this.#aggregates.values(), this.targetMs);
    }
    return this.#ranked;
  }

  #hydrate(): Promise<void> {
    if (!this.#hydration) {
      this.#hydration = this.store.loadScoreRecords().then(
        (records) => {
          for (const record of records) {
            this.record(record);
          }
        },
        (error: unknown) => {
          this.#hydration = null;
          throw error;
        }
      );
    }
    return this.#hydration;
  }
}
