import Link from "next/link";
import styles from "./Button.module.css";

type Variant = "primary" | "secondary";

type ButtonProps =
  | { href: string; children: React.ReactNode; variant?: Variant }
  | { onClick: () => void; children: React.ReactNode; variant?: Variant; disabled?: boolean };

export function Button(props: ButtonProps) {
  const variant = props.variant ?? "secondary";
  const className = `${styles.button} ${variant === "primary" ? styles.primary : styles.secondary}`;

  if ("href" in props) {
    return (
      <Link className={className} href={props.href}>
        {props.children}
      </Link>
    );
  }

  return (
    <button className={className} type="button" onClick={props.onClick} disabled={props.disabled}>
      {props.children}
    </button>
  );
}
