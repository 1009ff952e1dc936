/** A plain record. Spreading it makes an independent copy. */
export type SomeRecord = {
  count: number;
};

/** Instances are shared: every binding to one instance sees the same state. */
export class SomeClass {
  count = 0;

  increment(): void {
    this.count += 1;
  }
}

export enum SomeEnum {
  First = "first",
  Second = "second"
}

export type LoadingState =
  | { status: "idle" }
  | { status: "loading" }
  | { status: "success"; data: string }
  | { status: "failure"; error: Error };

export type TypeDefinitionKind = "record" | "class" | "enum";

export type TypeDefinition = {
  kind: TypeDefinitionKind;
  name: string;
  semantics: "value" | "reference" | "cases";
};

// Type aliases and enums leave no name behind at run time, only classes do.
export const TYPE_DEFINITIONS: readonly TypeDefinition[] = [
  { kind: "record", name: "SomeRecord", semantics: "value" },
  { kind: "class", name: SomeClass.name, semantics: "reference" },
  { kind: "enum", name: "SomeEnum", semantics: "cases" }
];

export function typeNameOf(kind: TypeDefinitionKind): string {
  const definition = TYPE_DEFINITIONS.find((entry) => entry.kind === kind);
  return definition?.name ?? kind;
}

export function enumCases(): SomeEnum[] {
  return Object.values(SomeEnum);
}

export function describeLoadingState(state: LoadingState): string {
  switch (state.status) {
    case "idle":
      return "idle";
    case "loading":
      return "loading";
    case "success":
      return `success: ${state.data}`;
    case "failure":
      return `failure: ${state.error.message}`;
  }
}
