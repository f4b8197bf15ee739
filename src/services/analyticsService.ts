import { type AnalyticsSummary, projectSummary } from '../domain/analytics.js';
import { DEFAULT_TARGET_MS } from '../domain/scoring.js';
import type { SessionRecordStore } from './gameStore.js';

export class AnalyticsProjector {
  constructor(
    private readonly store: Pick<SessionRecordStore, 'loadScoreRecords' | 'countSessions'>,
    private readonly targetMs: number = DEFAULT_TARGET_MS
  ) {}

  async summarize(userId: string): Promise<AnalyticsSummary> {
    const [records, tally] = await Promise.all([
      this.store.loadScoreRecords(userId),
      this.store.countSessions(userId)
    ]);
    return projectSummary(userId, records, this.targetMs, tally);
  }
}
