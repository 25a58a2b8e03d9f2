import type { ActivityLevel, MovementPattern, ObservationRecord } from '../types';
import { mean, standardDeviation } from '../utils/statistics';
import { localHour } from '../utils/timestamp';

const MIN_SAMPLES_FOR_PATTERNS = 5;

export function classifyMovementPatterns(
  distances: readonly number[],
  detections: readonly ObservationRecord[]
): MovementPattern[] {
  if (distances.length < MIN_SAMPLES_FOR_PATTERNS) {
    return ['insufficient_data'];
  }

  const patterns: MovementPattern[] = [];
  const average = mean(distances);
  const spread = standardDeviation(distances);

  if (average < 10) {
    patterns.push('low_mobility');
  } else if (average > 50) {
    patterns.push('high_mobility');
  } else {
    patterns.push('moderate_mobility');
  }

  if (spread < average * 0.3) {
    patterns.push('consistent_movement');
  } else if (spread > average * 0.8) {
    patterns.push('erratic_movement');
  } else {
    patterns.push('variable_movement');
  }

  const moving = distances.filter(distance => distance > 0).length;
  if (moving > 0) {
    const ratio = moving / distances.length;
    if (ratio > 0.7) {
      patterns.push('continuous_activity');
    } else if (ratio < 0.3) {
      patterns.push('sporadic_activity');
    } else {
      patterns.push('intermittent_activity');
    }
  }

  // 昼 = 6時〜18時
  const day = detections.filter(record => {
    const hour = localHour(record.timestamp);
    return hour >= 6 && hour < 18;
  }).length;
  const night = detections.length - day;

  if (night > day * 1.5) {
    patterns.push('nocturnal');
  } else if (day > night * 1.5) {
    patterns.push('diurnal');
  } else {
    patterns.push('crepuscular');
  }

  return patterns;
}

export function classifyActivityLevel(detections: number, distance: number): ActivityLevel {
  if (detections === 0) return 'none';
  if (detections < 5 && distance < 50) return 'low';
  if (detections < 15 && distance < 200) return 'medium';
  return 'high';
}

/**
 * 0〜1 の活動スコア。
 * 検出数 100・移動 1000px・継続 12時間・移動回数 50 をそれぞれ満点とした加重平均。
 */
export function activityScore(detections: number, distance: number, durationHours: number, movements: number): number {
  const scores = [
    Math.min(1.0, detections / 100),
    Math.min(1.0, distance / 1000),
    Math.min(1.0, durationHours / 12),
    Math.min(1.0, movements / 50),
  ];
  const weights = [0.3, 0.3, 0.2, 0.2];
  const score = scores.reduce((acc, value, index) => acc + value * weights[index], 0);
  return Math.max(0, Math.min(1, score));
}
