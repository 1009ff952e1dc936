import type { AbstractIntlMessages } from "next-intl";
import type { Locale } from "@/i18n/locales";

export async function loadMessages(locale: Locale): Promise<AbstractIntlMessages> {
  switch (locale) {
    case "en-US":
      return (await import("@/messages/en-US.json")).default;
    case "ja-JP":
      return (await import("@/messages/ja-JP.json")).default;
  }
}
