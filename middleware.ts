import type { NextRequest } from "next/server";
import { NextResponse } from "next/server";
import { pickLocaleFromAcceptLanguage } from "./src/i18n/acceptLanguage";
import { LOCALE_HEADER } from "./src/i18n/headers";
import { DEFAULT_LOCALE, isLocale } from "./src/i18n/locales";

const STATIC_FILE_EXTENSIONS = new Set(["css", "ico", "js", "map", "png", "svg", "txt", "webp", "woff2"]);

function isStaticAssetPath(pathname: string): boolean {
  const lastSegment = pathname.split("/").pop() ?? "";
  const dotIndex = lastSegment.lastIndexOf(".");
  if (dotIndex <= 0) return false;
  return STATIC_FILE_EXTENSIONS.has(lastSegment.slice(dotIndex + 1).toLowerCase());
}

// Unsupported locale-shaped segments fall through so `[locale]` can 404.
function looksLikeLocaleSegment(segment: string): boolean {
  return /^[a-zA-Z]{2}-[a-zA-Z]{2}$/.test(segment);
}

export function middleware(request: NextRequest) {
  const { pathname } = request.nextUrl;
  const [, first] = pathname.split("/");

  if (isStaticAssetPath(pathname)) {
    return NextResponse.next();
  }

  if (!first) {
    const preferred = pickLocaleFromAcceptLanguage(request.headers.get("accept-language"));
    return NextResponse.redirect(new URL(`/${preferred}`, request.url));
  }

  if (!isLocale(first)) {
    if (looksLikeLocaleSegment(first)) {
      return NextResponse.next();
    }
    return NextResponse.redirect(new URL(`/${DEFAULT_LOCALE}${pathname}`, request.url));
  }

  const requestHeaders = new Headers(request.headers);
  requestHeaders.set(LOCALE_HEADER, first);

  return NextResponse.next({
    request: {
      headers: requestHeaders
    }
  });
}

export const config = {
  matcher: ["/((?!_next).*)"]
};
