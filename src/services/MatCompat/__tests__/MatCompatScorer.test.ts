import { describe, expect, it } from "vitest";
import { MatCompatScorer, VocabIndexBuilder } from "../index";
import type { VocabIndex } from "../../../models/vocab.model";

const calculoIndex: VocabIndex = new Map([["calculo", { canonicalTerm: "calculo", weight: 0.9 }]]);

describe("MatCompatScorer", () => {
    it("returns a zero result for an empty vocabulary", () => {
        const result = MatCompatScorer.score("la integral de una funcion", new Map());
        expect(result).toEqual({
            score: 0,
            matchedTokens: 0,
            distinctTerms: 0,
            totalTokens: 5,
            significantTokens: 2,
            avgWeight: 0,
            density: 0,
            matches: []
        });
    });

    it("returns a zero result for blank text", () => {
        const result = MatCompatScorer.score("   ", calculoIndex);
        expect(result.score).toBe(0);
        expect(result.totalTokens).toBe(0);
        expect(result.matches).toEqual([]);
    });

    it("scores repeated terms against significant tokens", () => {
        const result = MatCompatScorer.score("me gusta el calculo y la calculo", calculoIndex);
        expect(result).toEqual({
            score: 79.5,
            matchedTokens: 2,
            distinctTerms: 1,
            totalTokens: 7,
            significantTokens: 3,
            avgWeight: 0.9,
            density: 0.6667,
            matches: [{ canonicalTerm: "calculo", count: 2, weight: 0.9, contribution: 1.8 }]
        });
    });

    it("falls back to all tokens when every token is a stopword", () => {
        const index = VocabIndexBuilder.buildIndex([
            { term: "de", identityPercent: 50 },
            { term: "la", identityPercent: 100 }
        ]);
        const result = MatCompatScorer.score("de la de", index);
        expect(result.significantTokens).toBe(0);
        expect(result.matchedTokens).toBe(3);
        expect(result.density).toBe(1);
        expect(result.avgWeight).toBe(0.6667);
        expect(result.score).toBe(81.67);
    });

    it("does not clamp scores above 100 when stopwords are vocabulary hits", () => {
        const index = VocabIndexBuilder.buildIndex([
            { term: "de", identityPercent: 100 },
            { term: "teorema", identityPercent: 100 }
        ]);
        const result = MatCompatScorer.score("teorema de de de", index);
        expect(result.significantTokens).toBe(1);
        expect(result.density).toBe(4);
        expect(result.score).toBe(235);
    });

    it("attributes synonym hits to the canonical term", () => {
        const index = VocabIndexBuilder.buildIndex([
            { term: "Álgebra", identityPercent: 80, synonymsCsv: "algebraica" }
        ]);
        const viaSynonym = MatCompatScorer.score("la algebraica", index);
        const viaTerm = MatCompatScorer.score("la algebra", index);

        expect(viaSynonym.matches).toEqual([{ canonicalTerm: "álgebra", count: 1, weight: 0.8, contribution: 0.8 }]);
        expect(viaSynonym.matchedTokens).toBe(viaTerm.matchedTokens);
        expect(viaSynonym.distinctTerms).toBe(viaTerm.distinctTerms);
        expect(viaSynonym.avgWeight).toBe(viaTerm.avgWeight);
    });

    it("is insensitive to case and accents", () => {
        expect(MatCompatScorer.score("El CÁLCULO y el Calculo", calculoIndex))
            .toEqual(MatCompatScorer.score("el calculo y el calculo", calculoIndex));
    });

    it("gives identical results for identical inputs", () => {
        const text = "el calculo diferencial y el calculo integral";
        expect(MatCompatScorer.score(text, calculoIndex)).toEqual(MatCompatScorer.score(text, calculoIndex));
    });

    it("tallies one canonical term loaded with two weights separately", () => {
        const index = VocabIndexBuilder.buildIndex([
            { term: "suma", identityPercent: 50, synonymsCsv: "sumar" },
            { term: "suma", identityPercent: 80, synonymsCsv: "adicion" }
        ]);
        const result = MatCompatScorer.score("sumar suma adicion", index);

        expect(result.distinctTerms).toBe(2);
        expect(result.matches).toEqual([
            { canonicalTerm: "suma", count: 2, weight: 0.8, contribution: 1.6 },
            { canonicalTerm: "suma", count: 1, weight: 0.5, contribution: 0.5 }
        ]);
        expect(result.avgWeight).toBe(0.7);
        expect(result.score).toBe(83.5);
    });

    it("orders equal contributions by first appearance", () => {
        const index = VocabIndexBuilder.buildIndex([
            { term: "alfa", identityPercent: 50 },
            { term: "beta", identityPercent: 50 }
        ]);
        const result = MatCompatScorer.score("beta y alfa", index);
        expect(result.matches.map(m => m.canonicalTerm)).toEqual(["beta", "alfa"]);
    });

    it("keeps match counts consistent with the totals", () => {
        const index = VocabIndexBuilder.buildIndex([
            { term: "matriz", identityPercent: 90, synonymsCsv: "matrices" },
            { term: "vector", identityPercent: 60 },
            { term: "escalar", identityPercent: 30 }
        ]);
        const result = MatCompatScorer.score("Una matriz, dos matrices, un vector y un escalar por vector.", index);

        expect(result.matchedTokens).toBe(5);
        expect(result.matches.reduce((sum, m) => sum + m.count, 0)).toBe(result.matchedTokens);
        expect(result.matches).toHaveLength(result.distinctTerms);
        expect(result.matches.map(m => m.canonicalTerm)).toEqual(["matriz", "vector", "escalar"]);
    });
});
