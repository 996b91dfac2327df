import { scale } from '../lib/scale.js';

export function total(a: number, b: number): number {
  return scale(a + b);
}

export function greet(name: string, punctuation: string | null): string {
  return `Hello, ${name}${punctuation ?? '.'}`;
}

export function fail(reason: string): never {
  throw new Error(`Refused: ${reason}`);
}
