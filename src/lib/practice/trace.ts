import { CONDITION_VALUE, isAtMostThree } from "@/lib/practice/conditionals";
import { double, DOUBLE_INPUT } from "@/lib/practice/functions";
import { FLOAT_PAIR, largerOf } from "@/lib/practice/generics";
import { typeNameOf } from "@/lib/practice/typeDefinitions";

export type TraceSink = (line: string) => void;

export function collectAppearanceTrace(): string[] {
  const lines: string[] = [];

  if (isAtMostThree(CONDITION_VALUE)) {
    lines.push("value is 3 or less");
  }

  lines.push(`double(${DOUBLE_INPUT}) = ${double(DOUBLE_INPUT)}`);
  lines.push(`record type = ${typeNameOf("record")}`);
  lines.push(`class  type = ${typeNameOf("class")}`);
  lines.push(`enum   type = ${typeNameOf("enum")}`);
  lines.push(
    `largerOf(${FLOAT_PAIR.first}, ${FLOAT_PAIR.second}) = ${largerOf(FLOAT_PAIR.first, FLOAT_PAIR.second)}`
  );

  return lines;
}

export function isTraceEnabled(): boolean {
  return (process.env.NEXT_PUBLIC_PRACTICE_TRACE ?? "on").toLowerCase() !== "off";
}

export function printAppearanceTrace(lines: readonly string[], log: TraceSink = (line) => console.log(line)): number {
  if (!isTraceEnabled()) return 0;

  for (const line of lines) {
    log(line);
  }
  return lines.length;
}
