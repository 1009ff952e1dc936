import { beforeEach, describe, expect, it, vi } from "vitest";
import { render, screen, fireEvent } from "@testing-library/react";

const replace = vi.fn();
let pathname: string | null = "/en-US";
let searchParams: URLSearchParams = new URLSearchParams("q=1");

vi.mock("next/navigation", () => ({
  useRouter: () => ({ replace }),
  usePathname: () => pathname,
  useSearchParams: () => searchParams
}));

import { LocaleSwitcher } from "@/components/molecules/LocaleSwitcher/LocaleSwitcher";

const OPTIONS = [
  { locale: "en-US", label: "English" },
  { locale: "ja-JP", label: "日本語" }
] as const;

function renderSwitcher() {
  render(<LocaleSwitcher locale="en-US" label="Language" options={[...OPTIONS]} />);
  return screen.getByLabelText("Language");
}

describe("<LocaleSwitcher />", () => {
  beforeEach(() => {
    pathname = "/en-US";
    searchParams = new URLSearchParams("q=1");
    replace.mockClear();
  });

  it("lists every option and selects the current locale", () => {
    const select = renderSwitcher();
    expect(select).toHaveValue("en-US");
    expect(screen.getByRole("option", { name: "日本語" })).toBeInTheDocument();
  });

  it("keeps the query string when switching locales", () => {
    fireEvent.change(renderSwitcher(), { target: { value: "ja-JP" } });
    expect(replace).toHaveBeenCalledWith("/ja-JP?q=1");
  });

  it("falls back to the locale root when pathname is null", () => {
    pathname = null;
    searchParams = new URLSearchParams();
    fireEvent.change(renderSwitcher(), { target: { value: "ja-JP" } });
    expect(replace).toHaveBeenCalledWith("/ja-JP");
  });

  it("does nothing when the current locale is picked again", () => {
    fireEvent.change(renderSwitcher(), { target: { value: "en-US" } });
    expect(replace).not.toHaveBeenCalled();
  });
});
