import type { VocabularySnapshot, VocabularyStats } from "../models/vocab.model";
import { VocabularyNotLoadedError } from "../models/errors.model";
import { VocabIndexBuilder } from "./MatCompat";
import type { VocabularyRepository } from "./vocabulary.repository";

/**
 * Holds the current vocabulary snapshot. A load builds a complete new snapshot
 * and swaps the reference; callers that already hold the old one keep scoring
 * against it. Nothing here mutates a published snapshot.
 */
class VocabularyService {
    private snapshot: VocabularySnapshot | null = null;
    private inFlight: Promise<VocabularySnapshot> | null = null;

    constructor(private readonly repository: VocabularyRepository) { }

    load(): Promise<VocabularySnapshot> {
        if (!this.inFlight) {
            this.inFlight = this.loadFresh().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    private async loadFresh(): Promise<VocabularySnapshot> {
        const source = this.repository.describe();
        try {
            const records = await this.repository.fetchRecords();
            const snapshot = VocabIndexBuilder.buildSnapshot(records, source);
            this.snapshot = snapshot;

            console.log("📚 Vocabulary loaded:", {
                source,
                terms: snapshot.termCount,
                keys: snapshot.keyCount
            });
            return snapshot;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Vocabulary load from ${source} failed: ${message}`);
            throw error;
        }
    }

    isLoaded(): boolean {
        return this.snapshot !== null;
    }

    current(): VocabularySnapshot {
        if (!this.snapshot) {
            throw new VocabularyNotLoadedError();
        }
        return this.snapshot;
    }

    stats(): VocabularyStats {
        const snapshot = this.current();
        return {
            termCount: snapshot.termCount,
            keyCount: snapshot.keyCount,
            loadedAt: snapshot.loadedAt.toISOString(),
            source: snapshot.source
        };
    }
}

export default VocabularyService;
