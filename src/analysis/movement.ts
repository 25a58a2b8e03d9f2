import type { MovementSample, ObservationRecord } from '../types';
import { maxSpeedPerMinute, type AppConfig } from '../config';
import { euclideanDistance } from '../utils/geometry';
import { elapsedMinutes } from '../utils/timestamp';
import { getLogger } from '../utils/logger';
import { detectZScoreOutliers } from './outliers';
import { interpolateByIndex } from './interpolation';
import { centeredMovingAverage } from './smoothing';

const logger = getLogger('movement');

export type MovementOptions = Pick<AppConfig, 'movement' | 'frame'>;

export interface MovementResult {
  samples: MovementSample[];
  rejected: MovementSample[];
  distances: number[];
  outliersReplaced: number;
}

interface Position {
  timestamp: string;
  x: number;
  y: number;
}

function validPositions(series: readonly ObservationRecord[]): Position[] {
  return series.flatMap(record =>
    record.xCenter === null || record.yCenter === null
      ? []
      : [{ timestamp: record.timestamp, x: record.xCenter, y: record.yCenter }]
  );
}

/**
 * 時刻順の系列から、連続する有効位置間の移動距離を求める。
 * 速度上限を超える区間は検出の途切れとみなして捨てる（0 には丸めない）。
 */
export function computeMovements(series: readonly ObservationRecord[], options: MovementOptions): MovementResult {
  const { movement } = options;
  const ceiling = maxSpeedPerMinute(movement, options.frame);
  const positions = validPositions(series);

  const samples: MovementSample[] = [];
  const rejected: MovementSample[] = [];

  for (let i = 1; i < positions.length; i++) {
    const prev = positions[i - 1];
    const current = positions[i];
    const minutes = elapsedMinutes(prev.timestamp, current.timestamp);
    let distance = euclideanDistance(prev.x, prev.y, current.x, current.y);

    const sample: MovementSample = { from: prev.timestamp, to: current.timestamp, distance, elapsedMinutes: minutes };

    if (minutes > 0 && distance / minutes > ceiling) {
      rejected.push(sample);
      continue;
    }

    // 微小な揺れは移動なしとして扱う
    if (distance < movement.jitterThreshold) {
      distance = 0;
    }
    samples.push({ ...sample, distance });
  }

  let distances = samples.map(sample => sample.distance);
  let outliersReplaced = 0;

  if (movement.outlierRemoval.enabled && distances.length > movement.outlierRemoval.minSamples) {
    const outliers = detectZScoreOutliers(distances, movement.outlierRemoval.threshold);
    if (outliers.count > 0) {
      const blanked = distances.map((distance, index) => (outliers.mask[index] ? null : distance));
      distances = interpolateByIndex(blanked).values.map(value => value ?? 0);
      outliersReplaced = outliers.count;
    }
  }

  if (movement.smoothing.enabled && distances.length > movement.smoothing.window) {
    distances = centeredMovingAverage(distances, movement.smoothing.window).map(value => value ?? 0);
  }

  if (rejected.length > 0 || outliersReplaced > 0) {
    logger.debug('Movement samples adjusted', { rejected: rejected.length, outliersReplaced });
  }

  return { samples, rejected, distances, outliersReplaced };
}
