export interface RawDetection {
  xCenter: number;
  yCenter: number;
  width: number;
  height: number;
  confidence: number;
  classId: string;
  timestamp: string;
}

export interface BoundingBox {
  xCenter: number;
  yCenter: number;
  width: number;
  height: number;
}

/**
 * 1観察サイクル = 1行。
 * 検出なしの行では位置・信頼度系は null（0 と混同しない）。
 */
export interface ObservationRecord {
  timestamp: string;
  sequence: number;
  detectionCount: number;
  hasDetection: boolean;
  xCenter: number | null;
  yCenter: number | null;
  meanConfidence: number | null;
  maxConfidence: number | null;
  bboxArea: number | null;
  qualityScore: number | null;
  processingTimeMs: number | null;
}

export const NUMERIC_COLUMNS = [
  'xCenter',
  'yCenter',
  'meanConfidence',
  'maxConfidence',
  'bboxArea',
  'qualityScore',
  'processingTimeMs',
] as const;

export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

export function isNumericColumn(name: string): name is NumericColumn {
  return NUMERIC_COLUMNS.some(column => column === name);
}

export interface MovementSample {
  from: string;
  to: string;
  distance: number;
  elapsedMinutes: number;
}

export interface MovementStatistics {
  meanDistance: number;
  stdDistance: number;
  maxDistance: number;
  nonZeroMovements: number;
}

export type MovementPattern =
  | 'no_activity'
  | 'insufficient_data'
  | 'low_mobility'
  | 'moderate_mobility'
  | 'high_mobility'
  | 'consistent_movement'
  | 'variable_movement'
  | 'erratic_movement'
  | 'continuous_activity'
  | 'intermittent_activity'
  | 'sporadic_activity'
  | 'diurnal'
  | 'nocturnal'
  | 'crepuscular';

export interface ActivityMetrics {
  totalDetections: number;
  totalMovementDistance: number;
  averageMovementPerDetection: number;
  peakActivityHour: number;
  activeDurationMinutes: number;
  detectionReliability: number;
  dataCompletenessRatio: number;
  activityScore: number;
  movementStatistics: MovementStatistics;
  movementPatterns: MovementPattern[];
}

export type ActivityLevel = 'none' | 'low' | 'medium' | 'high';

export interface HourlySummary {
  date: string;
  hour: number;
  observationCount: number;
  detectionCount: number;
  movementDistance: number;
  averageConfidence: number | null;
  activityLevel: ActivityLevel;
}

export interface DailySummary {
  date: string;
  observationCount: number;
  activeHours: number;
  metrics: ActivityMetrics;
  hourly: HourlySummary[];
}

/** 保存済みの日次サマリー（時間別の行は別ファイル） */
export type DailySummaryRecord = Omit<DailySummary, 'hourly'>;
