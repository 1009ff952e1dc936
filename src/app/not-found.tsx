import { Button } from "@/components/atoms/Button/Button";
import { DEFAULT_LOCALE } from "@/i18n/locales";
import { withLocale } from "@/i18n/paths";
import styles from "@/app/layout.module.css";

export default function NotFound() {
  return (
    <main className={styles.main}>
      <div className={styles.container}>
        <h1>Page not found</h1>
        <p>Only the practice board is served here.</p>
        <Button href={withLocale(DEFAULT_LOCALE, "/")} variant="primary">
          Back to the practice board
        </Button>
      </div>
    </main>
  );
}
