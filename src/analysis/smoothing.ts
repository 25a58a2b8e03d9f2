/**
 * 中心移動平均。端では使える範囲だけの短い窓で平均し、長さは変えない。
 * 窓内の欠損は無視し、窓がすべて欠損なら null。
 */
export function centeredMovingAverage(values: readonly (number | null)[], window: number): (number | null)[] {
  if (window <= 1) return [...values];

  const half = Math.floor(window / 2);

  return values.map((_, index) => {
    const start = Math.max(0, index - half);
    const end = Math.min(values.length - 1, index + half);

    let total = 0;
    let count = 0;
    for (let i = start; i <= end; i++) {
      const value = values[i];
      if (value !== null) {
        total += value;
        count++;
      }
    }

    return count > 0 ? total / count : null;
  });
}
