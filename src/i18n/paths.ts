import { DEFAULT_LOCALE, isLocale, type Locale } from "@/i18n/locales";

function normalizePathname(pathname: string): string {
  const withSlash = pathname.startsWith("/") ? pathname : `/${pathname}`;
  return withSlash === "/" ? "/" : withSlash.replace(/\/$/, "");
}

export function withLocale(locale: Locale, pathname: string): string {
  const normalized = normalizePathname(pathname);
  return normalized === "/" ? `/${locale}` : `/${locale}${normalized}`;
}

export function stripLocaleFromPathname(pathname: string): { locale: Locale; pathname: string } {
  const normalized = normalizePathname(pathname);
  const [, first, ...rest] = normalized.split("/");

  if (first && isLocale(first)) {
    return { locale: first, pathname: normalizePathname(rest.join("/")) };
  }

  return { locale: DEFAULT_LOCALE, pathname: normalized };
}
