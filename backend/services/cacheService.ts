import type Redis from "ioredis";
import { isRecord } from "../types/analysis";
import logger from "../utils/logger";

/** Serialized report as it comes back out of the cache. */
export type CachedAnalysisReport = Record<string, unknown>;

export interface ReportCache {
  getReport(analysisId: string): Promise<CachedAnalysisReport | null>;
  setReport(analysisId: string, report: unknown): Promise<void>;
  evictReports(analysisIds: readonly string[]): Promise<void>;
}

const reportKey = (analysisId: string) => `analysis:${analysisId}:report`;

export const createReportCache = (redis: Redis, ttlSeconds: number): ReportCache => ({
  async getReport(analysisId) {
    const cached = await redis.get(reportKey(analysisId));
    if (!cached) return null;
    try {
      const parsed: unknown = JSON.parse(cached);
      return isRecord(parsed) ? parsed : null;
    } catch (error) {
      logger.warn({ analysisId, error }, "Discarding unreadable cached report");
      await redis.del(reportKey(analysisId));
      return null;
    }
  },

  async setReport(analysisId, report) {
    await redis.set(reportKey(analysisId), JSON.stringify(report), "EX", ttlSeconds);
  },

  async evictReports(analysisIds) {
    if (analysisIds.length === 0) return;
    await redis.del(...analysisIds.map(reportKey));
  },
});

export default createReportCache;
