import { DEFAULT_LOCALE, type Locale } from "@/i18n/locales";

const LANGUAGE_TO_LOCALE: Partial<Record<string, Locale>> = {
  en: "en-US",
  ja: "ja-JP"
};

type LanguageRange = {
  tag: string;
  quality: number;
  order: number;
};

function parseQuality(params: string[]): number {
  for (const param of params) {
    const [key, value] = param.split("=").map((part) => part.trim());
    if (key !== "q" || value === undefined) continue;
    const quality = Number(value);
    return Number.isFinite(quality) ? quality : 0;
  }
  return 1;
}

function parseAcceptLanguage(header: string): string[] {
  const ranges: LanguageRange[] = [];

  header.split(",").forEach((part, order) => {
    const [tag, ...params] = part.trim().split(";");
    const trimmed = tag?.trim();
    if (!trimmed) return;
    ranges.push({ tag: trimmed, quality: parseQuality(params), order });
  });

  return ranges
    .filter((range) => range.quality > 0)
    .sort((left, right) => right.quality - left.quality || left.order - right.order)
    .map((range) => range.tag);
}

export function pickLocaleFromAcceptLanguage(header: string | null): Locale {
  if (!header) return DEFAULT_LOCALE;

  for (const tag of parseAcceptLanguage(header)) {
    const [lang] = tag.toLowerCase().split("-");
    if (!lang) continue;
    const mapped = LANGUAGE_TO_LOCALE[lang];
    if (mapped) return mapped;
  }

  return DEFAULT_LOCALE;
}
