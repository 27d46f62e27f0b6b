import type { PresentedScore, ScoreResult } from "../../../models/score.model";

export class ScorePresenter {

    // Metric line shown under the gauge
    static caption(result: ScoreResult): string {
        return [
            `Tokens totales: ${result.totalTokens}`,
            `Tokens significativos: ${result.significantTokens}`,
            `Tokens matemáticos: ${result.matchedTokens}`,
            `Términos matemáticos distintos: ${result.distinctTerms}`,
            `Promedio de peso: ${result.avgWeight}`,
            `Densidad matemática: ${result.density}`
        ].join(" · ");
    }

    static present(result: ScoreResult): PresentedScore {
        return {
            ...result,
            scoreLabel: `${result.score.toFixed(2)}%`,
            progress: Math.min(1, result.score / 100),
            caption: this.caption(result),
            hasMatches: result.matches.length > 0
        };
    }
}
