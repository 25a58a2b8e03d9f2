import type { NormalizationMethod } from '../config';
import { mean, median, presentValues, quantile, standardDeviation } from '../utils/statistics';

export type ScalerMethod = Exclude<NormalizationMethod, 'none'>;

export type ScalerParameters =
  | { method: 'minmax'; min: number; max: number }
  | { method: 'standard'; mean: number; std: number }
  | { method: 'robust'; median: number; iqr: number };

export function fitScaler(method: ScalerMethod, values: readonly (number | null)[]): ScalerParameters | null {
  const present = presentValues(values);
  if (present.length < 2) return null;

  switch (method) {
    case 'minmax':
      return { method, min: Math.min(...present), max: Math.max(...present) };
    case 'standard':
      return { method, mean: mean(present), std: standardDeviation(present) };
    case 'robust':
      return { method, median: median(present), iqr: quantile(present, 0.75) - quantile(present, 0.25) };
  }
}

function scale(value: number, params: ScalerParameters): number {
  switch (params.method) {
    case 'minmax': {
      const range = params.max - params.min;
      return range === 0 ? 0 : (value - params.min) / range;
    }
    case 'standard':
      return params.std === 0 ? 0 : (value - params.mean) / params.std;
    case 'robust':
      return params.iqr === 0 ? 0 : (value - params.median) / params.iqr;
  }
}

export function transform(values: readonly (number | null)[], params: ScalerParameters): (number | null)[] {
  return values.map(value => (value === null ? null : scale(value, params)));
}

/**
 * 列ごとのスケーラーを1回の実行の間だけ保持する。
 * 最初に見た列で fit し、以降は同じパラメータで変換する。
 */
export class ScalerRegistry {
  private readonly fitted = new Map<string, ScalerParameters>();

  constructor(private readonly method: ScalerMethod) {}

  fitTransform(column: string, values: readonly (number | null)[]): (number | null)[] | null {
    let params = this.fitted.get(column);
    if (!params) {
      const fittedParams = fitScaler(this.method, values);
      if (!fittedParams) return null;
      this.fitted.set(column, fittedParams);
      params = fittedParams;
    }
    return transform(values, params);
  }

  get(column: string): ScalerParameters | undefined {
    return this.fitted.get(column);
  }

  parameters(): Record<string, ScalerParameters> {
    return Object.fromEntries(this.fitted);
  }

  reset(): void {
    this.fitted.clear();
  }
}
