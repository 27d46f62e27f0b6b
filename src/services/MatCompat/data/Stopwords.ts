/**
 * Spanish function words (articles, conjunctions, prepositions, pronouns).
 * Stored already lowercased and without accents, matching tokenizer output.
 */
export const STOPWORDS_ES: ReadonlySet<string> = new Set([
    "de", "la", "las", "el", "los", "y", "o", "u", "en", "con", "por", "para",
    "a", "un", "una", "unos", "unas", "al", "del", "que", "se", "su", "sus",
    "es", "son", "como", "pero", "si", "no", "lo", "le", "este", "estos",
    "esta", "estas", "me"
]);
