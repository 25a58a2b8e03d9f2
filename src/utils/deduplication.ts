import type { BoundingBox } from '../types';
import { intersectionOverUnion } from './geometry';

interface ScoredBox extends BoundingBox {
  confidence: number;
}

export interface SuppressedDuplicate {
  index: number;
  keptIndex: number;
  iou: number;
}

export interface DeduplicationResult<T> {
  kept: T[];
  suppressed: SuppressedDuplicate[];
}

export function suppressDuplicates<T extends ScoredBox>(
  detections: readonly T[],
  iouThreshold: number
): DeduplicationResult<T> {
  if (detections.length <= 1) {
    return { kept: [...detections], suppressed: [] };
  }

  // 信頼度の高い順（同値なら入力順）に並べて貪欲に採用
  const order = detections
    .map((detection, index) => ({ detection, index }))
    .sort((a, b) => b.detection.confidence - a.detection.confidence || a.index - b.index);

  const keptIndices: number[] = [];
  const suppressed: SuppressedDuplicate[] = [];

  for (const candidate of order) {
    let duplicateOf: { index: number; iou: number } | null = null;

    for (const keptIndex of keptIndices) {
      const iou = intersectionOverUnion(candidate.detection, detections[keptIndex]);
      if (iou > iouThreshold) {
        duplicateOf = { index: keptIndex, iou };
        break;
      }
    }

    if (duplicateOf === null) {
      keptIndices.push(candidate.index);
    } else {
      suppressed.push({ index: candidate.index, keptIndex: duplicateOf.index, iou: duplicateOf.iou });
    }
  }

  // 出力は入力順を維持（再フィルタで同じ結果になる）
  keptIndices.sort((a, b) => a - b);

  return {
    kept: keptIndices.map(index => detections[index]),
    suppressed,
  };
}
