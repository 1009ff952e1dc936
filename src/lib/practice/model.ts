/**
 * The demo model shown at the top of the practice board.
 *
 * `a` is a plain (mutable) field; everything else is `readonly`, so the
 * compiler rejects any assignment to it.
 */
export type PracticeModel = {
  a: number;
  readonly b: number;
  readonly intArray: readonly number[];
  readonly stringArray: readonly string[];
};

export const ASSIGNED_A = 456;

export function createPracticeModel(): PracticeModel {
  return {
    a: 0,
    b: 100,
    intArray: [1, 2, 3],
    stringArray: ["a", "b", "c"]
  };
}

/**
 * Copies the model and assigns {@link ASSIGNED_A} to `a` on the copy.
 * React state is replaced with the result; the model passed in stays as it was.
 */
export function assignIntToA(model: PracticeModel): PracticeModel {
  const next = { ...model };
  next.a = ASSIGNED_A;
  return next;
}

export function formatSequence(items: readonly (number | string)[]): string {
  return `[${items.map(String).join(", ")}]`;
}
