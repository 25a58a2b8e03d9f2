import type { ObservationRecord, RawDetection } from '../types';

const pad = (value: number): string => String(value).padStart(2, '0');

/** +09:00 の壁時計でのタイムスタンプ */
export const at = (hour: number, minute: number, date = '2024-06-01'): string =>
  `${date}T${pad(hour)}:${pad(minute)}:00+09:00`;

export const observation = (timestamp: string, overrides: Partial<ObservationRecord> = {}): ObservationRecord => ({
  timestamp,
  sequence: 1,
  detectionCount: 0,
  hasDetection: false,
  xCenter: null,
  yCenter: null,
  meanConfidence: null,
  maxConfidence: null,
  bboxArea: null,
  qualityScore: null,
  processingTimeMs: null,
  ...overrides,
});

export const detected = (
  timestamp: string,
  x: number,
  y: number,
  confidence = 0.9,
  overrides: Partial<ObservationRecord> = {}
): ObservationRecord =>
  observation(timestamp, {
    detectionCount: 1,
    hasDetection: true,
    xCenter: x,
    yCenter: y,
    meanConfidence: confidence,
    maxConfidence: confidence,
    bboxArea: 2500,
    qualityScore: 0.7,
    ...overrides,
  });

export const detection = (overrides: Partial<RawDetection> = {}): RawDetection => ({
  xCenter: 100,
  yCenter: 100,
  width: 50,
  height: 50,
  confidence: 0.9,
  classId: 'insect',
  timestamp: at(10, 0),
  ...overrides,
});
