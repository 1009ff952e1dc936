export type Comparable = number | string;

export type Pair<T> = {
  readonly first: T;
  readonly second: T;
};

export const FLOAT_PAIR: Pair<number> = { first: 1.5, second: 2.5 };

export const WORD_PAIR: Pair<string> = { first: "apple", second: "banana" };

/** Returns the larger argument; ties keep `first`. */
export function largerOf<T extends Comparable>(first: T, second: T): T {
  return second > first ? second : first;
}

export function isInOrder<T extends Comparable>(first: T, second: T): boolean {
  return first <= second;
}
