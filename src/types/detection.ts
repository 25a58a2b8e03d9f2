import type { ActivityMetrics, DailySummary, MovementSample } from './index';
import type { CleaningReport } from '../analysis/cleaner';
import type { SeriesFeatures } from '../analysis/features';
import type { FilterStatisticsSnapshot } from '../detection/statistics';
import type { Diagnostic } from '../utils/errors';

export interface CycleDetectionInput {
  xCenter: number;
  yCenter: number;
  width: number;
  height: number;
  confidence: number;
  classId: string;
}

/**
 * 撮影・推論側が1サイクルごとに書き出す入力行（JSON Lines）。
 * detectionCount / detected は任意で、detections と矛盾すれば検証エラー扱い。
 */
export interface ObservationCycle {
  timestamp: string;
  sequence?: number;
  detectionCount?: number;
  detected?: boolean;
  detections: CycleDetectionInput[];
  processingTimeMs?: number | null;
}

export interface AnalysisReport {
  version: string;
  date: string;
  createdAt: string;
  statistics: {
    inputRecords: number;
    cleanedRecords: number;
    movementSamples: number;
    rejectedMovements: number;
  };
  cleaning: CleaningReport;
  movements: MovementSample[];
  metrics: ActivityMetrics;
  daily: DailySummary;
  features: SeriesFeatures;
  diagnostics: Diagnostic[];
}

export interface IngestReport {
  inputFile: string;
  cycles: number;
  recordsWritten: number;
  files: string[];
  filterStatistics: FilterStatisticsSnapshot;
  diagnostics: Diagnostic[];
}
