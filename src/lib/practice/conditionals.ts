export const CONDITION_VALUE = 2;

export const CONDITION_LIMIT = 3;

export type ValueBranch = "atMost" | "greater";

export function isAtMostThree(value: number): boolean {
  return value <= CONDITION_LIMIT;
}

export function describeValue(value: number): ValueBranch {
  if (isAtMostThree(value)) {
    return "atMost";
  }
  return "greater";
}
