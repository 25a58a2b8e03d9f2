import type { ActivityMetrics, DailySummary, HourlySummary, ObservationRecord } from '../types';
import type { AppConfig } from '../config';
import { clamp, mean, presentValues, standardDeviation, sum } from '../utils/statistics';
import { elapsedMinutes, localDate, localHour } from '../utils/timestamp';
import { computeMovements, type MovementResult } from './movement';
import { activityScore, classifyActivityLevel, classifyMovementPatterns } from './patterns';

export type ActivityOptions = Pick<AppConfig, 'movement' | 'frame' | 'observation'>;

export const HOURS_PER_DAY = 24;

export function emptyMetrics(): ActivityMetrics {
  return {
    totalDetections: 0,
    totalMovementDistance: 0,
    averageMovementPerDetection: 0,
    peakActivityHour: 0,
    activeDurationMinutes: 0,
    detectionReliability: 0,
    dataCompletenessRatio: 0,
    activityScore: 0,
    movementStatistics: { meanDistance: 0, stdDistance: 0, maxDistance: 0, nonZeroMovements: 0 },
    movementPatterns: ['no_activity'],
  };
}

/** 検出の最も多い時（同数なら早い方）。検出がなければ 0。 */
export function peakActivityHour(detections: readonly ObservationRecord[]): number {
  const counts = new Array<number>(HOURS_PER_DAY).fill(0);
  for (const record of detections) {
    counts[localHour(record.timestamp)]++;
  }

  let peak = 0;
  for (let hour = 1; hour < HOURS_PER_DAY; hour++) {
    if (counts[hour] > counts[peak]) peak = hour;
  }
  return peak;
}

export function completenessRatio(observed: number, options: Pick<AppConfig, 'observation'>): number {
  const expected = options.observation.periodMinutes / options.observation.intervalMinutes;
  if (observed === 0 || expected <= 0) return 0;
  return clamp(observed / expected, 0, 1);
}

/**
 * クリーニング済み系列から活動指標を算出する。
 * 検出が 1 件もない系列はエラーではなく、充足率も含めてすべて 0 の指標を返す。
 */
export function computeMetrics(
  series: readonly ObservationRecord[],
  options: ActivityOptions,
  movements: MovementResult = computeMovements(series, options)
): ActivityMetrics {
  const detections = series.filter(record => record.hasDetection);
  const totalDetections = detections.length;
  if (totalDetections === 0) {
    return emptyMetrics();
  }

  const distances = movements.distances;
  const totalMovementDistance = sum(distances);

  const activeDurationMinutes =
    detections.length > 1
      ? Math.max(0, elapsedMinutes(detections[0].timestamp, detections[detections.length - 1].timestamp))
      : 0;

  const nonZeroMovements = distances.filter(distance => distance > 0).length;

  return {
    totalDetections,
    totalMovementDistance,
    averageMovementPerDetection: totalMovementDistance / totalDetections,
    peakActivityHour: peakActivityHour(detections),
    activeDurationMinutes,
    detectionReliability: mean(presentValues(detections.map(record => record.meanConfidence))),
    dataCompletenessRatio: completenessRatio(series.length, options),
    activityScore: activityScore(totalDetections, totalMovementDistance, activeDurationMinutes / 60, nonZeroMovements),
    movementStatistics: {
      meanDistance: mean(distances),
      stdDistance: standardDeviation(distances),
      maxDistance: distances.length > 0 ? Math.max(...distances) : 0,
      nonZeroMovements,
    },
    movementPatterns: classifyMovementPatterns(distances, detections),
  };
}

/**
 * 指定日の 24 時間分の集計。観察のない時間帯も 0 件の行として出す。
 */
export function summarizeHours(
  date: string,
  series: readonly ObservationRecord[],
  options: ActivityOptions
): HourlySummary[] {
  const buckets: ObservationRecord[][] = Array.from({ length: HOURS_PER_DAY }, () => []);
  for (const record of series) {
    if (localDate(record.timestamp) === date) {
      buckets[localHour(record.timestamp)].push(record);
    }
  }

  return buckets.map((bucket, hour) => {
    const detections = bucket.filter(record => record.hasDetection);
    const movementDistance = bucket.length > 1 ? sum(computeMovements(bucket, options).distances) : 0;
    const confidences = presentValues(detections.map(record => record.meanConfidence));

    return {
      date,
      hour,
      observationCount: bucket.length,
      detectionCount: detections.length,
      movementDistance,
      averageConfidence: confidences.length > 0 ? mean(confidences) : null,
      activityLevel: classifyActivityLevel(detections.length, movementDistance),
    };
  });
}

export function summarizeDay(
  date: string,
  series: readonly ObservationRecord[],
  options: ActivityOptions
): DailySummary {
  const rows = series.filter(record => localDate(record.timestamp) === date);
  const hourly = summarizeHours(date, rows, options);

  return {
    date,
    observationCount: rows.length,
    activeHours: hourly.filter(summary => summary.detectionCount > 0).length,
    metrics: computeMetrics(rows, options),
    hourly,
  };
}
