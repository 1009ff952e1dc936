"use client";

import { useEffect, useState } from "react";
import { useTranslations } from "next-intl";
import { Button } from "@/components/atoms/Button/Button";
import { ValueText } from "@/components/atoms/ValueText/ValueText";
import { ConceptCard } from "@/components/molecules/ConceptCard/ConceptCard";
import { CONDITION_LIMIT, CONDITION_VALUE, describeValue, isAtMostThree } from "@/lib/practice/conditionals";
import { double, DOUBLE_INPUT } from "@/lib/practice/functions";
import { FLOAT_PAIR, isInOrder, largerOf, WORD_PAIR } from "@/lib/practice/generics";
import { assignIntToA, createPracticeModel, formatSequence } from "@/lib/practice/model";
import { collectAppearanceTrace, printAppearanceTrace } from "@/lib/practice/trace";
import { enumCases, TYPE_DEFINITIONS } from "@/lib/practice/typeDefinitions";
import { demonstrateReferenceSharing, demonstrateValueCopy } from "@/lib/practice/valueCopy";
import styles from "./PracticeBoard.module.css";

function ConditionalVerdict() {
  const t = useTranslations("practice");

  if (describeValue(CONDITION_VALUE) === "atMost") {
    return <p className={styles.emphasis}>{t("conditionals.atMost")}</p>;
  }
  return <p className={styles.emphasis}>{t("conditionals.greater")}</p>;
}

export function PracticeBoard() {
  const t = useTranslations("practice");
  const [model, setModel] = useState(createPracticeModel);

  // Runs once per mount, i.e. when the view appears.
  useEffect(() => {
    printAppearanceTrace(collectAppearanceTrace());
  }, []);

  const copied = demonstrateValueCopy(model);
  const shared = demonstrateReferenceSharing();

  return (
    <div className={styles.board}>
      <ConceptCard id="bindings" title={t("bindings.title")}>
        <ValueText label={t("bindings.mutable")} value={model.a} />
        <ValueText label={t("bindings.immutable")} value={model.b} />
        <Button variant="primary" onClick={() => setModel(assignIntToA)}>
          {t("bindings.assign")}
        </Button>
      </ConceptCard>

      <ConceptCard
        id="arrays"
        title={t("arrays.title")}
        caption={t("arrays.counts", { ints: model.intArray.length, strings: model.stringArray.length })}
      >
        <ValueText label={t("arrays.ints")} value={formatSequence(model.intArray)} />
        <ValueText label={t("arrays.strings")} value={formatSequence(model.stringArray)} />
      </ConceptCard>

      <ConceptCard id="conditionals" title={t("conditionals.title")} caption={t("conditionals.consoleHint")}>
        <ValueText label="value" value={CONDITION_VALUE} />
        <p>
          {t("conditionals.verdict", {
            expression: `value <= ${CONDITION_LIMIT}`,
            result: String(isAtMostThree(CONDITION_VALUE))
          })}
        </p>
        <ConditionalVerdict />
      </ConceptCard>

      <ConceptCard id="functions" title={t("functions.title")} caption={t("functions.note")}>
        <ValueText label={t("functions.input")} value={`double(${DOUBLE_INPUT})`} />
        <ValueText label={t("functions.output")} value={double(DOUBLE_INPUT)} />
        <p className={styles.muted}>{t("functions.example")}</p>
      </ConceptCard>

      <ConceptCard id="types" title={t("types.title")} caption={t("types.note")}>
        {TYPE_DEFINITIONS.map((definition) => (
          <ValueText
            key={definition.kind}
            label={t(`types.${definition.kind}`)}
            value={`${definition.name} (${t(`types.semantics.${definition.semantics}`)})`}
          />
        ))}
        <p className={styles.muted}>{t("types.cases", { cases: enumCases().join(", ") })}</p>
      </ConceptCard>

      <ConceptCard id="value-copy" title={t("valueCopy.title")} caption={t("valueCopy.note")}>
        <ValueText label="original.a" value={copied.originalA} />
        <ValueText label="copy.a" value={copied.copyA} />
        <ValueText label="first.count" value={shared.firstCount} />
        <ValueText label="second.count" value={shared.secondCount} />
      </ConceptCard>

      <ConceptCard id="generics" title={t("generics.title")} caption={t("generics.note")}>
        <ValueText label="pair" value={`(${FLOAT_PAIR.first}, ${FLOAT_PAIR.second})`} />
        <ValueText label="largerOf(first, second)" value={largerOf(FLOAT_PAIR.first, FLOAT_PAIR.second)} />
        <ValueText
          label={`largerOf("${WORD_PAIR.first}", "${WORD_PAIR.second}")`}
          value={JSON.stringify(largerOf(WORD_PAIR.first, WORD_PAIR.second))}
        />
        <ValueText
          label={`${t("generics.flag")} (first <= second)`}
          value={isInOrder(FLOAT_PAIR.first, FLOAT_PAIR.second)}
        />
      </ConceptCard>
    </div>
  );
}
