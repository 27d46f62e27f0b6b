/**
 * MatCompat Scoring
 *
 *   score = 100 * (0.55 * avgWeight + 0.45 * density)
 *
 * avgWeight is the mean weight per matched occurrence; density is matched
 * occurrences over significant (non-stopword) tokens, or over all tokens when
 * nothing significant is left. Stopwords that are vocabulary terms still match,
 * so density can pass 1 and the score 100. The result is not clamped.
 */

import type { VocabEntry, VocabIndex } from "../../../models/vocab.model";
import type { MatchRecord, ScoreResult } from "../../../models/score.model";
import { TextNormalizer } from "../text/TextNormalizer";
import { StopwordFilter } from "../text/StopwordFilter";
import { NumberUtils } from "../utils/NumberUtils";

interface MatchTally {
    entry: VocabEntry;
    count: number;
}

export class MatCompatScorer {

    static readonly WEIGHT_FACTOR = 0.55;
    static readonly DENSITY_FACTOR = 0.45;

    static score(text: string, index: VocabIndex): ScoreResult {
        const tokens = TextNormalizer.tokenize(text);
        const totalTokens = tokens.length;
        const significantTokens = StopwordFilter.filterSignificant(tokens).length;

        // Keyed by term and weight: one canonical term loaded twice with
        // different weights is tallied separately.
        const tallies = new Map<string, MatchTally>();
        let matchedTokens = 0;
        let weightSum = 0;

        for (const token of tokens) {
            const entry = index.get(token);
            if (!entry) continue;

            const key = `${entry.canonicalTerm}\u0000${entry.weight}`;
            const tally = tallies.get(key);
            if (tally) {
                tally.count++;
            } else {
                tallies.set(key, { entry, count: 1 });
            }
            matchedTokens++;
            weightSum += entry.weight;
        }

        if (matchedTokens === 0) {
            return {
                score: 0,
                matchedTokens: 0,
                distinctTerms: 0,
                totalTokens,
                significantTokens,
                avgWeight: 0,
                density: 0,
                matches: []
            };
        }

        const avgWeight = weightSum / matchedTokens;
        const denominator = significantTokens > 0 ? significantTokens : totalTokens;
        const density = matchedTokens / denominator;
        const score = 100 * (this.WEIGHT_FACTOR * avgWeight + this.DENSITY_FACTOR * density);

        // Array.prototype.sort is stable, first-seen order survives ties
        const matches: MatchRecord[] = Array.from(tallies.values())
            .map(({ entry, count }) => ({
                canonicalTerm: entry.canonicalTerm,
                count,
                weight: entry.weight,
                contribution: NumberUtils.roundHalfEven(count * entry.weight, 4)
            }))
            .sort((a, b) => b.contribution - a.contribution);

        return {
            score: NumberUtils.roundHalfEven(score, 2),
            matchedTokens,
            distinctTerms: tallies.size,
            totalTokens,
            significantTokens,
            avgWeight: NumberUtils.roundHalfEven(avgWeight, 4),
            density: NumberUtils.roundHalfEven(density, 4),
            matches
        };
    }
}
