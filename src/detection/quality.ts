import type { RawDetection } from '../types';
import type { FrameConfig } from '../config';
import { boxArea } from '../utils/geometry';
import { clamp, mean } from '../utils/statistics';

const REFERENCE_AREA = 10_000;

/**
 * 検出1件の品質スコア (0〜1)。除外には使わず、記録への注釈のみ。
 *  - 基本は信頼度
 *  - 極端なアスペクト比 (<0.5, >3.0) は 0.8 倍
 *  - 面積 10000px² を基準にした大きさ係数 (0.7〜1.0)
 *  - フレーム端に近い検出は 0.9 倍
 */
export function detectionQualityScore(detection: RawDetection, frame: FrameConfig): number {
  let score = detection.confidence;

  const aspectRatio = detection.height > 0 ? detection.width / detection.height : 0;
  if (aspectRatio < 0.5 || aspectRatio > 3.0) {
    score *= 0.8;
  }

  const sizeScore = Math.min(1.0, boxArea(detection) / REFERENCE_AREA);
  score *= 0.7 + 0.3 * sizeScore;

  const margin = frame.borderMargin;
  if (
    detection.xCenter < margin ||
    detection.yCenter < margin ||
    detection.xCenter > frame.width - margin ||
    detection.yCenter > frame.height - margin
  ) {
    score *= 0.9;
  }

  return clamp(score, 0, 1);
}

export function cycleQualityScore(detections: readonly RawDetection[], frame: FrameConfig): number | null {
  if (detections.length === 0) return null;
  return mean(detections.map(detection => detectionQualityScore(detection, frame)));
}
