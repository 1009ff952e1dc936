import { describe, expect, it } from "vitest";
import { assignIntToA, createPracticeModel } from "@/lib/practice/model";
import { demonstrateReferenceSharing, demonstrateValueCopy } from "@/lib/practice/valueCopy";

describe("demonstrateValueCopy", () => {
  it("mutates only the copy", () => {
    const model = createPracticeModel();
    expect(demonstrateValueCopy(model)).toEqual({ originalA: 0, copyA: 999 });
    expect(model.a).toBe(0);
  });

  it("reports the current value of the original", () => {
    expect(demonstrateValueCopy(assignIntToA(createPracticeModel()))).toEqual({ originalA: 456, copyA: 999 });
  });
});

describe("demonstrateReferenceSharing", () => {
  it("shows the mutation through both bindings", () => {
    expect(demonstrateReferenceSharing()).toEqual({ firstCount: 1, secondCount: 1, sameInstance: true });
  });
});
