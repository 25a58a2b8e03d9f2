export interface InterpolationResult {
  values: (number | null)[];
  filled: number;
}

interface Anchor {
  index: number;
  value: number;
}

/**
 * 欠損値を時刻に対して線形補間する。
 * 前後どちらかに有効値がない端の欠損は最寄りの有効値で埋める（後方埋め→前方埋め）。
 * 列がすべて欠損ならそのまま返す。
 */
export function interpolateMissing(times: readonly number[], values: readonly (number | null)[]): InterpolationResult {
  if (times.length !== values.length) {
    throw new RangeError(`times (${times.length}) and values (${values.length}) differ in length`);
  }

  const anchors: Anchor[] = values.flatMap((value, index) => (value === null ? [] : [{ index, value }]));

  if (anchors.length === 0 || anchors.length === values.length) {
    return { values: [...values], filled: 0 };
  }

  const result = [...values];
  let filled = 0;

  const first = anchors[0];
  const last = anchors[anchors.length - 1];

  for (let i = 0; i < first.index; i++) {
    result[i] = first.value;
    filled++;
  }

  for (let k = 0; k < anchors.length - 1; k++) {
    const left = anchors[k];
    const right = anchors[k + 1];
    for (let i = left.index + 1; i < right.index; i++) {
      result[i] = linearAt(times[left.index], left.value, times[right.index], right.value, times[i]);
      filled++;
    }
  }

  for (let i = last.index + 1; i < result.length; i++) {
    result[i] = last.value;
    filled++;
  }

  return { values: result, filled };
}

export function linearAt(t1: number, v1: number, t2: number, v2: number, t: number): number {
  if (t2 === t1) return v1;
  return v1 + ((v2 - v1) * (t - t1)) / (t2 - t1);
}

/** 時刻軸を持たない数列（移動距離など）を添字に対して補間する。 */
export function interpolateByIndex(values: readonly (number | null)[]): InterpolationResult {
  return interpolateMissing(
    values.map((_, index) => index),
    values
  );
}
