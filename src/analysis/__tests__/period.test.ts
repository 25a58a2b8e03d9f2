import { describe, expect, it } from 'vitest';
import type { ActivityMetrics, DailySummaryRecord } from '../../types';
import { emptyMetrics } from '../activity';
import { computePeriodStatistics } from '../period';

const day = (date: string, observationCount: number, metrics: Partial<ActivityMetrics> = {}): DailySummaryRecord => ({
  date,
  observationCount,
  activeHours: metrics.totalDetections ? 1 : 0,
  metrics: { ...emptyMetrics(), ...metrics },
});

describe('computePeriodStatistics', () => {
  it('summarizes stored days in date order', () => {
    const stats = computePeriodStatistics([
      day('2024-06-03', 100, { totalDetections: 10, peakActivityHour: 21, activityScore: 0.2, totalMovementDistance: 50 }),
      day('2024-06-01', 100, { totalDetections: 30, peakActivityHour: 21, activityScore: 0.4, totalMovementDistance: 150 }),
      day('2024-06-02', 200, {}),
      day('2024-06-04', 100, { totalDetections: 30, peakActivityHour: 5, activityScore: 0.3 }),
    ]);

    expect(stats.startDate).toBe('2024-06-01');
    expect(stats.endDate).toBe('2024-06-04');
    expect(stats.days).toBe(4);
    expect(stats.totalObservations).toBe(500);
    expect(stats.totalDetections).toBe(70);
    expect(stats.daysWithDetections).toBe(3);
    expect(stats.detectionRate).toBeCloseTo(0.14, 10);
    expect(stats.averageDailyDetections).toBe(17.5);
    expect(stats.totalMovementDistance).toBe(200);
    expect(stats.averageActivityScore).toBeCloseTo(0.225, 10);
    expect(stats.mostActiveDay).toBe('2024-06-01');
    expect(stats.mostActiveHour).toBe(21);
    expect(stats.distribution.map(d => d.date)).toEqual(['2024-06-01', '2024-06-02', '2024-06-03', '2024-06-04']);
    expect(stats.distribution[1]).toEqual({ date: '2024-06-02', detections: 0, observations: 200, activityScore: 0 });
  });

  it('handles an empty period', () => {
    const stats = computePeriodStatistics([]);

    expect(stats.days).toBe(0);
    expect(stats.startDate).toBeNull();
    expect(stats.mostActiveDay).toBeNull();
    expect(stats.mostActiveHour).toBeNull();
    expect(stats.detectionRate).toBe(0);
  });
});
