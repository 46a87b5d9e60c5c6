
export function clamp01(x: number): number {
  return Math.max(0, Math.min(1, x));
}

export function clamp(min: number, max: number, x: number): number {
  return Math.max(min, Math.min(max, x));
}

export function isUnitInterval(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 1;
}
