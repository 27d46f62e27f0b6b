import { Decimal128 } from "mongodb";
import DbService from "./db.service";
import type { VocabDocument, VocabRecord } from "../models/vocab.model";

/**
 * Source of raw vocabulary records. Order matters: later records win index
 * collisions.
 */
export interface VocabularyRepository {
    fetchRecords(): Promise<VocabRecord[]>;
    describe(): string;
}

export class MongoVocabularyRepository implements VocabularyRepository {
    constructor(private readonly collectionName: string) { }

    // Decimal128 columns arrive as objects; hand them over as numeric strings
    static toRecord(doc: VocabDocument): VocabRecord {
        const percent = doc.porcentaje_identidad instanceof Decimal128
            ? doc.porcentaje_identidad.toString()
            : doc.porcentaje_identidad;
        return {
            term: doc.palabra,
            identityPercent: percent,
            synonymsCsv: doc.sinonimos
        };
    }

    async fetchRecords(): Promise<VocabRecord[]> {
        const docs = await DbService.getManyData<VocabDocument>(
            this.collectionName,
            {},
            { _id: 0, palabra: 1, porcentaje_identidad: 1, sinonimos: 1 }
        );
        return docs.map(doc => MongoVocabularyRepository.toRecord(doc));
    }

    describe(): string {
        return `mongodb:${this.collectionName}`;
    }
}
