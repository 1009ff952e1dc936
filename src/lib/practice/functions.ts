export const DOUBLE_INPUT = 2;

export function double(x: number): number {
  return x * 2;
}
