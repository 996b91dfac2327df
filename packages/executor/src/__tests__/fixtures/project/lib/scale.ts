export const FACTOR = 10;

export function scale(value: number): number {
  return value * FACTOR;
}
