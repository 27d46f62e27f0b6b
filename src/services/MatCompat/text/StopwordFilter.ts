import { STOPWORDS_ES } from "../data/Stopwords";

export class StopwordFilter {

    static isStopword(token: string, stopwords: ReadonlySet<string> = STOPWORDS_ES): boolean {
        return stopwords.has(token);
    }

    // Content words only; order and repeats are kept
    static filterSignificant(tokens: readonly string[], stopwords: ReadonlySet<string> = STOPWORDS_ES): string[] {
        return tokens.filter(t => !stopwords.has(t));
    }
}
