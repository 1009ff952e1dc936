import type { Metadata } from "next";
import "@/app/globals.css";
import styles from "@/app/layout.module.css";
import { headers } from "next/headers";
import { DEFAULT_LOCALE, isLocale } from "@/i18n/locales";
import { LOCALE_HEADER } from "@/i18n/headers";

export const metadata: Metadata = {
  title: {
    default: "Language Practice",
    template: "%s · Language Practice"
  },
  description: "A one-page board of basic language concepts shown as live state."
};

export default async function RootLayout({ children }: { children: React.ReactNode }) {
  const localeHeader = (await headers()).get(LOCALE_HEADER);
  const locale = localeHeader && isLocale(localeHeader) ? localeHeader : DEFAULT_LOCALE;

  return (
    <html lang={locale}>
      <body className={styles.shell}>{children}</body>
    </html>
  );
}
