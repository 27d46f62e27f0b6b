/**
 * Vocabulary Index Builder
 * Flattens vocabulary records into one lookup keyed by every normalized surface
 * form (base term and synonyms). Colliding keys keep the last record processed.
 */

import type { VocabEntry, VocabIndex, VocabRecord, VocabTerm, VocabularySnapshot } from "../../../models/vocab.model";
import { DataError } from "../../../models/errors.model";
import { TextNormalizer } from "../text/TextNormalizer";
import { NumberUtils } from "../utils/NumberUtils";

export class VocabIndexBuilder {

    private static describeValue(value: unknown): string {
        return typeof value === "string" ? `"${value}"` : String(value);
    }

    static parseSynonyms(raw: unknown): string[] {
        if (raw === null || raw === undefined) return [];
        return String(raw)
            .split(",")
            .map(s => s.trim().toLowerCase())
            .filter(Boolean);
    }

    /**
     * Validates one raw record. `position` is the record's 0-based place in the
     * source and ends up in the DataError message.
     */
    static parseVocabRecord(record: VocabRecord, position: number): VocabTerm {
        const term = record.term === null || record.term === undefined ? "" : String(record.term).trim();
        if (!term) {
            throw new DataError(`Vocabulary record ${position}: term is missing`, position);
        }

        const percent = NumberUtils.parseNumeric(record.identityPercent);
        if (percent === null) {
            throw new DataError(
                `Vocabulary record ${position} (${term}): identity percentage ${this.describeValue(record.identityPercent)} is not a number`,
                position
            );
        }

        return Object.freeze({
            canonicalTerm: term.toLowerCase(),
            weight: NumberUtils.clamp(percent / 100, 0, 1),
            synonyms: Object.freeze(this.parseSynonyms(record.synonymsCsv))
        });
    }

    static parseVocabRecords(records: Iterable<VocabRecord>): VocabTerm[] {
        const terms: VocabTerm[] = [];
        let position = 0;
        for (const record of records) {
            terms.push(this.parseVocabRecord(record, position));
            position++;
        }
        return terms;
    }

    static indexTerms(terms: readonly VocabTerm[]): VocabIndex {
        const index = new Map<string, VocabEntry>();

        for (const term of terms) {
            const entry: VocabEntry = Object.freeze({ canonicalTerm: term.canonicalTerm, weight: term.weight });
            index.set(TextNormalizer.normalizeToken(term.canonicalTerm), entry);

            for (const synonym of term.synonyms) {
                const key = TextNormalizer.normalizeToken(synonym);
                if (key) {
                    index.set(key, entry);
                }
            }
        }

        return index;
    }

    /**
     * Every record is validated before the first key is written, so a bad
     * record means no index at all.
     */
    static buildIndex(records: Iterable<VocabRecord>): VocabIndex {
        return this.indexTerms(this.parseVocabRecords(records));
    }

    static buildSnapshot(records: Iterable<VocabRecord>, source: string, loadedAt: Date = new Date()): VocabularySnapshot {
        const terms = this.parseVocabRecords(records);
        const index = this.indexTerms(terms);
        return Object.freeze({
            index,
            termCount: terms.length,
            keyCount: index.size,
            loadedAt,
            source
        });
    }
}
