import type { BoundingBox } from "../backends/types";

export function area(box: BoundingBox): number {
  return Math.max(0, box.width) * Math.max(0, box.height);
}

export function intersectionOverUnion(a: BoundingBox, b: BoundingBox): number {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);
  const intersection = Math.max(0, right - left) * Math.max(0, bottom - top);
  const union = area(a) + area(b) - intersection;
  if (union <= 0) {
    return 0;
  }
  return intersection / union;
}

export function weightedRegion(regions: Array<{ region: BoundingBox; weight: number }>): BoundingBox {
  const total = regions.reduce((sum, entry) => sum + entry.weight, 0);
  const entries = total > 0 ? regions : regions.map((entry) => ({ ...entry, weight: 1 }));
  const divisor = total > 0 ? total : entries.length;
  const sum = entries.reduce(
    (acc, entry) => ({
      x: acc.x + entry.region.x * entry.weight,
      y: acc.y + entry.region.y * entry.weight,
      width: acc.width + entry.region.width * entry.weight,
      height: acc.height + entry.region.height * entry.weight
    }),
    { x: 0, y: 0, width: 0, height: 0 }
  );
  return {
    x: sum.x / divisor,
    y: sum.y / divisor,
    width: sum.width / divisor,
    height: sum.height / divisor
  };
}
