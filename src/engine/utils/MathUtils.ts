export const MathUtils = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  /** Linear interpolation */
  lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
  },

  /** Geometric builder efficiency: 1 + 0.8 + 0.8² … for n builders */
  diminishingSum(n: number, ratio: number): number {
    if (n <= 0) return 0;
    return (1 - Math.pow(ratio, n)) / (1 - ratio);
  },
};
