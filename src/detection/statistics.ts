export interface FilterStatisticsSnapshot {
  cyclesProcessed: number;
  inputDetections: number;
  invalidDetections: number;
  confidenceFiltered: number;
  sizeFiltered: number;
  duplicateFiltered: number;
  keptDetections: number;
  cyclesWithDetection: number;
}

const COUNTER_KEYS: readonly (keyof FilterStatisticsSnapshot)[] = [
  'cyclesProcessed',
  'inputDetections',
  'invalidDetections',
  'confidenceFiltered',
  'sizeFiltered',
  'duplicateFiltered',
  'keptDetections',
  'cyclesWithDetection',
];

const emptySnapshot = (): FilterStatisticsSnapshot => ({
  cyclesProcessed: 0,
  inputDetections: 0,
  invalidDetections: 0,
  confidenceFiltered: 0,
  sizeFiltered: 0,
  duplicateFiltered: 0,
  keptDetections: 0,
  cyclesWithDetection: 0,
});

/**
 * フィルタ規則ごとの除外数。呼び出し側が所有し、参照で渡す。
 * 同時に複数スレッドから使う想定はない。
 */
export class FilterStatistics {
  private counts: FilterStatisticsSnapshot = emptySnapshot();

  add(delta: Partial<FilterStatisticsSnapshot>): void {
    for (const key of COUNTER_KEYS) {
      this.counts[key] += delta[key] ?? 0;
    }
  }

  merge(other: FilterStatistics): void {
    this.add(other.snapshot());
  }

  reset(): void {
    this.counts = emptySnapshot();
  }

  get totalFiltered(): number {
    const { invalidDetections, confidenceFiltered, sizeFiltered, duplicateFiltered } = this.counts;
    return invalidDetections + confidenceFiltered + sizeFiltered + duplicateFiltered;
  }

  snapshot(): FilterStatisticsSnapshot {
    return { ...this.counts };
  }
}
