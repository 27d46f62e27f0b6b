/**
 * Text Normalization
 * Lowercasing, accent stripping and word tokenization shared by the vocabulary
 * index and the scorer, so that "Cálculo" and "calculo" land on the same key.
 */

const COMBINING_MARKS = /\p{Mn}/gu;
const NON_WORD_RUN = /[^\p{L}\p{N}_]+/u;

export class TextNormalizer {

    static stripAccents(s: string): string {
        return s.normalize("NFD").replace(COMBINING_MARKS, "");
    }

    static normalizeToken(s: string): string {
        return this.stripAccents(s.trim().toLowerCase());
    }

    /**
     * Splits on every maximal run of non-word characters. Tokens keep their
     * order of appearance and duplicates are preserved.
     */
    static tokenize(text: string): string[] {
        const folded = this.stripAccents(text.toLowerCase());
        return folded.split(NON_WORD_RUN).filter(t => t.length > 0);
    }
}
