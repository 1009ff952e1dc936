import styles from "./ConceptCard.module.css";

export function ConceptCard({
  id,
  title,
  caption,
  children
}: {
  id: string;
  title: string;
  caption?: string;
  children: React.ReactNode;
}) {
  const titleId = `${id}-title`;

  return (
    <section className={styles.card} aria-labelledby={titleId}>
      <h2 id={titleId} className={styles.title}>
        {title}
      </h2>
      <div className={styles.body}>{children}</div>
      {caption ? <p className={styles.caption}>{caption}</p> : null}
    </section>
  );
}
