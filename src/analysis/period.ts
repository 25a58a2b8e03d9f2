import type { DailySummaryRecord } from '../types';
import { mean, sum } from '../utils/statistics';

export interface DailyDistributionEntry {
  date: string;
  detections: number;
  observations: number;
  activityScore: number;
}

export interface PeriodStatistics {
  startDate: string | null;
  endDate: string | null;
  days: number;
  totalObservations: number;
  totalDetections: number;
  daysWithDetections: number;
  detectionRate: number;
  averageDailyDetections: number;
  totalMovementDistance: number;
  averageActivityScore: number;
  mostActiveDay: string | null;
  mostActiveHour: number | null;
  distribution: DailyDistributionEntry[];
}

function mode(values: readonly number[]): number | null {
  if (values.length === 0) return null;

  const counts = new Map<number, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: number | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && value < best)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/**
 * 複数日の日次サマリーから期間統計をまとめる。
 * 最も活発な日は検出数最大（同数なら早い日）、最も活発な時は各日のピーク時の最頻値。
 */
export function computePeriodStatistics(summaries: readonly DailySummaryRecord[]): PeriodStatistics {
  const ordered = [...summaries].sort((a, b) => a.date.localeCompare(b.date));

  const totalObservations = sum(ordered.map(summary => summary.observationCount));
  const totalDetections = sum(ordered.map(summary => summary.metrics.totalDetections));
  const active = ordered.filter(summary => summary.metrics.totalDetections > 0);

  let mostActive: DailySummaryRecord | null = null;
  for (const summary of active) {
    if (!mostActive || summary.metrics.totalDetections > mostActive.metrics.totalDetections) {
      mostActive = summary;
    }
  }

  return {
    startDate: ordered.length > 0 ? ordered[0].date : null,
    endDate: ordered.length > 0 ? ordered[ordered.length - 1].date : null,
    days: ordered.length,
    totalObservations,
    totalDetections,
    daysWithDetections: active.length,
    detectionRate: totalObservations > 0 ? totalDetections / totalObservations : 0,
    averageDailyDetections: mean(ordered.map(summary => summary.metrics.totalDetections)),
    totalMovementDistance: sum(ordered.map(summary => summary.metrics.totalMovementDistance)),
    averageActivityScore: mean(ordered.map(summary => summary.metrics.activityScore)),
    mostActiveDay: mostActive ? mostActive.date : null,
    mostActiveHour: mode(active.map(summary => summary.metrics.peakActivityHour)),
    distribution: ordered.map(summary => ({
      date: summary.date,
      detections: summary.metrics.totalDetections,
      observations: summary.observationCount,
      activityScore: summary.metrics.activityScore,
    })),
  };
}
