import { notFound } from "next/navigation";
import { isLocale, type Locale } from "@/i18n/locales";

export type LocaleParams = Promise<{ locale: string }>;

/** Resolves the `[locale]` route segment, or renders the not-found page. */
export async function getLocaleFromParams(params: LocaleParams): Promise<Locale> {
  const { locale } = await params;
  if (!isLocale(locale)) notFound();
  return locale;
}
