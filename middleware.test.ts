// @vitest-environment node
import { describe, expect, it } from "vitest";
import { NextRequest } from "next/server";
import { middleware } from "./middleware";

function request(pathname: string, acceptLanguage?: string): NextRequest {
  const headers = new Headers();
  if (acceptLanguage) headers.set("accept-language", acceptLanguage);
  return new NextRequest(new URL(pathname, "http://localhost:3000"), { headers });
}

describe("middleware", () => {
  it("redirects / by Accept-Language", () => {
    const response = middleware(request("/", "ja,en;q=0.8"));
    expect(response.status).toBe(307);
    expect(response.headers.get("location")).toBe("http://localhost:3000/ja-JP");
  });

  it("redirects / to the default locale without Accept-Language", () => {
    const response = middleware(request("/"));
    expect(response.headers.get("location")).toBe("http://localhost:3000/en-US");
  });

  it("prefixes unknown paths with the default locale", () => {
    const response = middleware(request("/arrays"));
    expect(response.headers.get("location")).toBe("http://localhost:3000/en-US/arrays");
  });

  it("lets unsupported locale segments through so they can 404", () => {
    const response = middleware(request("/fr-FR"));
    expect(response.headers.get("location")).toBeNull();
    expect(response.headers.get("x-middleware-next")).toBe("1");
  });

  it("passes the locale to server components as a request header", () => {
    const response = middleware(request("/ja-JP"));
    expect(response.headers.get("x-middleware-request-x-practice-locale")).toBe("ja-JP");
  });

  it("skips static assets", () => {
    const response = middleware(request("/favicon.ico"));
    expect(response.headers.get("location")).toBeNull();
    expect(response.headers.get("x-middleware-request-x-practice-locale")).toBeNull();
  });
});
