import type { BoundingBox } from '../types';

interface Corners {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

function toCorners(box: BoundingBox): Corners {
  return {
    x1: box.xCenter - box.width / 2,
    y1: box.yCenter - box.height / 2,
    x2: box.xCenter + box.width / 2,
    y2: box.yCenter + box.height / 2,
  };
}

export function boxArea(box: BoundingBox): number {
  return box.width * box.height;
}

/**
 * 中心座標＋幅高さ形式の2矩形の IoU (Intersection over Union)。
 * 交差なし・面積ゼロの場合は 0。
 */
export function intersectionOverUnion(a: BoundingBox, b: BoundingBox): number {
  const ca = toCorners(a);
  const cb = toCorners(b);

  const left = Math.max(ca.x1, cb.x1);
  const top = Math.max(ca.y1, cb.y1);
  const right = Math.min(ca.x2, cb.x2);
  const bottom = Math.min(ca.y2, cb.y2);

  if (right <= left || bottom <= top) {
    return 0;
  }

  const intersection = (right - left) * (bottom - top);
  const union = boxArea(a) + boxArea(b) - intersection;

  return union > 0 ? intersection / union : 0;
}

export function euclideanDistance(x1: number, y1: number, x2: number, y2: number): number {
  return Math.sqrt((x2 - x1) ** 2 + (y2 - y1) ** 2);
}

export function frameDiagonal(width: number, height: number): number {
  return Math.sqrt(width ** 2 + height ** 2);
}
