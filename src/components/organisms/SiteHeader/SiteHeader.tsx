import Link from "next/link";
import { getTranslations } from "next-intl/server";
import { LocaleSwitcher } from "@/components/molecules/LocaleSwitcher/LocaleSwitcher";
import { SUPPORTED_LOCALES, type Locale } from "@/i18n/locales";
import { withLocale } from "@/i18n/paths";
import styles from "./SiteHeader.module.css";

export async function SiteHeader({ locale }: { locale: Locale }) {
  const tA11y = await getTranslations({ locale, namespace: "a11y" });
  const tLocaleNames = await getTranslations({ locale, namespace: "localeNames" });
  const tSite = await getTranslations({ locale, namespace: "site" });

  const options = SUPPORTED_LOCALES.map((l) => ({ locale: l, label: tLocaleNames(l) }));

  return (
    <header className={styles.header}>
      <div className={styles.inner}>
        <Link className={styles.brand} href={withLocale(locale, "/")}>
          {tSite("name")}
        </Link>
        <LocaleSwitcher locale={locale} label={tA11y("languageLabel")} options={options} />
      </div>
    </header>
  );
}
