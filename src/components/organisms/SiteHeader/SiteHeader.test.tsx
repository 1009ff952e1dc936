import { describe, expect, it, vi } from "vitest";
import { render, screen } from "@testing-library/react";

vi.mock("next-intl/server", () => ({
  getTranslations: async ({ namespace }: { locale: string; namespace: string }) => {
    return (key: string) => `${namespace}.${key}`;
  }
}));

vi.mock("next/navigation", () => ({
  useRouter: () => ({ replace: vi.fn() }),
  usePathname: () => "/ja-JP",
  useSearchParams: () => new URLSearchParams()
}));

import { SiteHeader } from "@/components/organisms/SiteHeader/SiteHeader";

describe("<SiteHeader />", () => {
  it("links the site name to the locale root", async () => {
    render(await SiteHeader({ locale: "ja-JP" }));
    expect(screen.getByRole("link", { name: "site.name" })).toHaveAttribute("href", "/ja-JP");
  });

  it("offers every supported locale in the switcher", async () => {
    render(await SiteHeader({ locale: "ja-JP" }));
    expect(screen.getByLabelText("a11y.languageLabel")).toHaveValue("ja-JP");
    expect(screen.getAllByRole("option").map((option) => option.textContent)).toEqual([
      "localeNames.en-US",
      "localeNames.ja-JP"
    ]);
  });
});
