/**
 * Vocabulary record as it arrives from the store. Fields are untyped until
 * VocabIndexBuilder validates them.
 */
interface VocabRecord {
    term: unknown;
    identityPercent: unknown;
    synonymsCsv?: unknown;
}

// Document shape of the `palabras_clave` collection
type VocabDocument = {
    palabra?: unknown;
    porcentaje_identidad?: unknown;
    sinonimos?: unknown;
};

interface VocabTerm {
    readonly canonicalTerm: string;
    readonly weight: number;
    readonly synonyms: readonly string[];
}

interface VocabEntry {
    readonly canonicalTerm: string;
    readonly weight: number;
}

type VocabIndex = ReadonlyMap<string, VocabEntry>;

interface VocabularySnapshot {
    readonly index: VocabIndex;
    readonly termCount: number;
    readonly keyCount: number;
    readonly loadedAt: Date;
    readonly source: string;
}

interface VocabularyStats {
    termCount: number;
    keyCount: number;
    loadedAt: string;
    source: string;
}

export type { VocabRecord, VocabDocument, VocabTerm, VocabEntry, VocabIndex, VocabularySnapshot, VocabularyStats };
