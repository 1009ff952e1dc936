/** Set by the middleware so server components outside `[locale]` know the active locale. */
export const LOCALE_HEADER = "x-practice-locale";
