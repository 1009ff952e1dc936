import type { PracticeModel } from "@/lib/practice/model";
import { SomeClass } from "@/lib/practice/typeDefinitions";

export const COPY_ASSIGNED_A = 999;

export type ValueCopyResult = {
  originalA: number;
  copyA: number;
};

export type ReferenceSharingResult = {
  firstCount: number;
  secondCount: number;
  sameInstance: boolean;
};

export function demonstrateValueCopy(model: PracticeModel): ValueCopyResult {
  const copy = { ...model };
  copy.a = COPY_ASSIGNED_A;
  return { originalA: model.a, copyA: copy.a };
}

export function demonstrateReferenceSharing(): ReferenceSharingResult {
  const first = new SomeClass();
  const second = first;
  second.increment();
  return {
    firstCount: first.count,
    secondCount: second.count,
    sameInstance: first === second
  };
}
