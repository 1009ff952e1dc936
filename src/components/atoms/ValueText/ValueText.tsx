import styles from "./ValueText.module.css";

export type DisplayValue = string | number | boolean;

/** One `label = value` line; the value is set in code type. */
export function ValueText({ label, value }: { label: string; value: DisplayValue }) {
  return (
    <p className={styles.line}>
      <span className={styles.label}>{label}</span>
      {" = "}
      <code className={styles.value}>{String(value)}</code>
    </p>
  );
}
