import translationTable from "./translations.json";

export type Language = "en" | "ar" | "hi";

const translations: Record<Language, Record<string, string>> = translationTable;

export function isLanguage(value: unknown): value is Language {
  return value === "en" || value === "ar" || value === "hi";
}

/**
 * Translate a key into the given language.
 * Supports {param} placeholders replaced by the params object.
 */
export function t(
  key: string,
  lang: Language,
  params?: Record<string, string>
): string {
  let text = translations[lang]?.[key] || translations.en[key] || key;
  if (params) {
    for (const [k, v] of Object.entries(params)) {
      text = text.replace(`{${k}}`, v);
    }
  }
  return text;
}
