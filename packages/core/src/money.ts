/** Round to cents. Reported money and percentage values go through this. */
export function round2(v: number): number {
  return Math.round(v * 100) / 100;
}
