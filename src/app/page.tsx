import { redirect } from "next/navigation";
import { DEFAULT_LOCALE } from "@/i18n/locales";
import { withLocale } from "@/i18n/paths";

export default function Page() {
  redirect(withLocale(DEFAULT_LOCALE, "/"));
}
