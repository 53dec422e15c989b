const LANGUAGE_ALIASES: Record<string, string> = {
  deutsch: "de",
  german: "de",
  englisch: "en",
  english: "en",
  spanisch: "es",
  spanish: "es",
  französisch: "fr",
  french: "fr",
  italienisch: "it",
  italian: "it",
};

const LANGUAGE_NAMES: Record<string, string> = {
  de: "German",
  en: "English",
  es: "Spanish",
  fr: "French",
  it: "Italian",
};

/**
 * "Deutsch" / "German" / "de" -> "de". Unknown values are lower-cased as-is.
 */
export function normalizeLanguage(input: string): string {
  const key = input.trim().toLowerCase();
  return LANGUAGE_ALIASES[key] ?? key;
}

export function parseLanguageList(input: string): string[] {
  const codes = input
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map(normalizeLanguage);
  return Array.from(new Set(codes));
}

/** English name used in prompts; falls back to the code itself. */
export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}
