const DEFAULT_SITE_URL = "http://localhost:3000";

function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

export function getSiteUrl(): string {
  const configured = process.env.SITE_URL || process.env.NEXT_PUBLIC_SITE_URL || DEFAULT_SITE_URL;
  return stripTrailingSlashes(configured.trim());
}
