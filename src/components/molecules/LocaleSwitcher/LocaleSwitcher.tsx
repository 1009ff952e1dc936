"use client";

import { usePathname, useRouter, useSearchParams } from "next/navigation";
import { isLocale, type Locale } from "@/i18n/locales";
import { stripLocaleFromPathname, withLocale } from "@/i18n/paths";
import styles from "./LocaleSwitcher.module.css";

export type LocaleSwitcherOption = {
  locale: Locale;
  label: string;
};

export function LocaleSwitcher({
  locale,
  label,
  options
}: {
  locale: Locale;
  label: string;
  options: LocaleSwitcherOption[];
}) {
  const router = useRouter();
  const pathname = usePathname() ?? "/";
  const searchParams = useSearchParams();

  function switchTo(nextLocale: string) {
    if (!isLocale(nextLocale) || nextLocale === locale) return;
    const nextPath = withLocale(nextLocale, stripLocaleFromPathname(pathname).pathname);
    const query = searchParams.toString();
    router.replace(query ? `${nextPath}?${query}` : nextPath);
  }

  return (
    <div className={styles.root}>
      <label className={styles.label} htmlFor="locale-switcher">
        {label}
      </label>
      <select
        id="locale-switcher"
        className={styles.select}
        value={locale}
        onChange={(e) => switchTo(e.target.value)}
      >
        {options.map((opt) => (
          <option key={opt.locale} value={opt.locale}>
            {opt.label}
          </option>
        ))}
      </select>
    </div>
  );
}
