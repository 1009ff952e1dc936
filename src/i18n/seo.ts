import type { Metadata } from "next";
import { DEFAULT_LOCALE, SUPPORTED_LOCALES, type Locale } from "@/i18n/locales";
import { stripLocaleFromPathname, withLocale } from "@/i18n/paths";
import { getSiteUrl } from "@/lib/siteUrl";

function absoluteUrl(locale: Locale, pathnameNoLocale: string): string {
  return `${getSiteUrl()}${withLocale(locale, pathnameNoLocale)}`;
}

export function canonicalUrl(locale: Locale, pathname: string): string {
  return absoluteUrl(locale, stripLocaleFromPathname(pathname).pathname);
}

export function alternatesForPath(locale: Locale, pathname: string): Metadata["alternates"] {
  const { pathname: pathnameNoLocale } = stripLocaleFromPathname(pathname);

  const languages: Record<string, string> = Object.fromEntries(
    SUPPORTED_LOCALES.map((l) => [l, absoluteUrl(l, pathnameNoLocale)])
  );
  languages["x-default"] = absoluteUrl(DEFAULT_LOCALE, pathnameNoLocale);

  return {
    canonical: absoluteUrl(locale, pathnameNoLocale),
    languages
  };
}
