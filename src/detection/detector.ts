import type { ObservationRecord, RawDetection } from '../types';
import type { ObservationCycle } from '../types/detection';
import type { AppConfig, DetectionConfig, FrameConfig } from '../config';
import { suppressDuplicates } from '../utils/deduplication';
import { boxArea } from '../utils/geometry';
import { mean } from '../utils/statistics';
import { isValidTimestamp } from '../utils/timestamp';
import { type Diagnostic, ValidationError, diagnosticFromValidation } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { FilterStatistics, type FilterStatisticsSnapshot } from './statistics';
import { cycleQualityScore } from './quality';

const logger = getLogger('detection');

export interface FilterResult {
  kept: RawDetection[];
  counts: FilterStatisticsSnapshot;
  diagnostics: Diagnostic[];
}

export interface CycleResult {
  record: ObservationRecord;
  kept: RawDetection[];
  diagnostics: Diagnostic[];
}

export function validateDetection(detection: RawDetection, index: number): ValidationError | null {
  const numericFields = ['xCenter', 'yCenter', 'width', 'height', 'confidence'] as const;
  for (const field of numericFields) {
    if (!Number.isFinite(detection[field])) {
      return new ValidationError(`Detection ${index} has a non-finite ${field}`, { index, field, value: detection[field] });
    }
  }

  if (detection.confidence < 0 || detection.confidence > 1) {
    return new ValidationError(`Detection ${index} confidence out of range [0, 1]: ${detection.confidence}`, {
      index,
      field: 'confidence',
      value: detection.confidence,
    });
  }

  if (detection.width <= 0 || detection.height <= 0) {
    return new ValidationError(`Detection ${index} has a non-positive size: ${detection.width}x${detection.height}`, {
      index,
      field: detection.width <= 0 ? 'width' : 'height',
      value: detection.width <= 0 ? detection.width : detection.height,
    });
  }

  return null;
}

function withinSize(detection: RawDetection, config: DetectionConfig): boolean {
  const { minSize, maxSize } = config;
  return (
    detection.width >= minSize.width &&
    detection.width <= maxSize.width &&
    detection.height >= minSize.height &&
    detection.height <= maxSize.height
  );
}

/**
 * 1サイクル分の生検出に 検証 → 信頼度 → サイズ → 重複除去 の順で適用する。
 * 不正な検出は ValidationError として診断に積み、残りの処理は続行する。
 */
export function filterDetections(
  raw: readonly RawDetection[],
  config: DetectionConfig,
  statistics?: FilterStatistics
): FilterResult {
  const diagnostics: Diagnostic[] = [];

  const valid: RawDetection[] = [];
  raw.forEach((detection, index) => {
    const error = validateDetection(detection, index);
    if (error) {
      diagnostics.push(diagnosticFromValidation(error));
    } else {
      valid.push(detection);
    }
  });

  const confident = valid.filter(detection => detection.confidence >= config.minConfidence);
  const sized = confident.filter(detection => withinSize(detection, config));
  const { kept } = suppressDuplicates(sized, config.duplicateIouThreshold);

  const counts: FilterStatisticsSnapshot = {
    cyclesProcessed: 1,
    inputDetections: raw.length,
    invalidDetections: raw.length - valid.length,
    confidenceFiltered: valid.length - confident.length,
    sizeFiltered: confident.length - sized.length,
    duplicateFiltered: sized.length - kept.length,
    keptDetections: kept.length,
    cyclesWithDetection: kept.length > 0 ? 1 : 0,
  };

  statistics?.add(counts);

  return { kept, counts, diagnostics };
}

function representative(kept: readonly RawDetection[], strategy: DetectionConfig['positionStrategy']) {
  if (strategy === 'mean') {
    return {
      xCenter: mean(kept.map(d => d.xCenter)),
      yCenter: mean(kept.map(d => d.yCenter)),
      bboxArea: mean(kept.map(boxArea)),
    };
  }

  // 最高信頼度（同値なら先頭）
  const best = kept.reduce((top, current) => (current.confidence > top.confidence ? current : top));
  return { xCenter: best.xCenter, yCenter: best.yCenter, bboxArea: boxArea(best) };
}

export function buildObservationRecord(
  timestamp: string,
  sequence: number,
  kept: readonly RawDetection[],
  processingTimeMs: number | null,
  config: DetectionConfig,
  frame: FrameConfig
): ObservationRecord {
  if (kept.length === 0) {
    return {
      timestamp,
      sequence,
      detectionCount: 0,
      hasDetection: false,
      xCenter: null,
      yCenter: null,
      meanConfidence: null,
      maxConfidence: null,
      bboxArea: null,
      qualityScore: null,
      processingTimeMs,
    };
  }

  const position = representative(kept, config.positionStrategy);
  const confidences = kept.map(d => d.confidence);

  return {
    timestamp,
    sequence,
    detectionCount: kept.length,
    hasDetection: true,
    xCenter: position.xCenter,
    yCenter: position.yCenter,
    meanConfidence: mean(confidences),
    maxConfidence: Math.max(...confidences),
    bboxArea: position.bboxArea,
    qualityScore: cycleQualityScore(kept, frame),
    processingTimeMs,
  };
}

export class DetectionFilter {
  private readonly statistics = new FilterStatistics();
  private nextSequence = 1;

  constructor(private readonly config: Pick<AppConfig, 'detection' | 'frame'>) {}

  processCycle(cycle: ObservationCycle): CycleResult {
    const sequence = cycle.sequence ?? this.nextSequence;
    this.nextSequence = sequence + 1;

    if (!isValidTimestamp(cycle.timestamp)) {
      throw new ValidationError(`Invalid timestamp: ${cycle.timestamp}`, { sequence, timestamp: cycle.timestamp });
    }

    const diagnostics: Diagnostic[] = [];

    if (cycle.detectionCount !== undefined && cycle.detectionCount !== cycle.detections.length) {
      diagnostics.push({
        kind: 'validation',
        message: `Cycle ${sequence} reports ${cycle.detectionCount} detections but lists ${cycle.detections.length}`,
        context: { sequence, timestamp: cycle.timestamp },
      });
    }
    if (cycle.detected !== undefined && cycle.detected !== cycle.detections.length > 0) {
      diagnostics.push({
        kind: 'validation',
        message: `Cycle ${sequence} detected flag disagrees with its detection list`,
        context: { sequence, timestamp: cycle.timestamp },
      });
    }

    const raw: RawDetection[] = cycle.detections.map(detection => ({ ...detection, timestamp: cycle.timestamp }));
    const filtered = filterDetections(raw, this.config.detection, this.statistics);
    diagnostics.push(...filtered.diagnostics);

    const record = buildObservationRecord(
      cycle.timestamp,
      sequence,
      filtered.kept,
      cycle.processingTimeMs ?? null,
      this.config.detection,
      this.config.frame
    );

    logger.debug('Processed observation cycle', {
      sequence,
      input: raw.length,
      kept: filtered.kept.length,
    });

    return { record, kept: filtered.kept, diagnostics };
  }

  processCycles(cycles: readonly ObservationCycle[]): { records: ObservationRecord[]; diagnostics: Diagnostic[] } {
    const records: ObservationRecord[] = [];
    const diagnostics: Diagnostic[] = [];

    for (let i = 0; i < cycles.length; i++) {
      try {
        const result = this.processCycle(cycles[i]);
        records.push(result.record);
        diagnostics.push(...result.diagnostics);
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        diagnostics.push(diagnosticFromValidation(error));
      }

      // 進捗表示
      if ((i + 1) % 500 === 0 || i === cycles.length - 1) {
        logger.info(`Processed ${i + 1}/${cycles.length} cycles`);
      }
    }

    return { records, diagnostics };
  }

  getStatistics(): FilterStatisticsSnapshot {
    return this.statistics.snapshot();
  }

  resetStatistics(): void {
    this.statistics.reset();
    this.nextSequence = 1;
  }
}
