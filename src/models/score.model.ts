export interface MatchRecord {
    canonicalTerm: string;
    count: number;
    weight: number;
    contribution: number;
}

export interface ScoreResult {
    score: number;
    matchedTokens: number;
    distinctTerms: number;
    totalTokens: number;
    significantTokens: number;
    avgWeight: number;
    density: number;
    matches: MatchRecord[];
}

// What the API hands to a display layer
export interface PresentedScore extends ScoreResult {
    scoreLabel: string;
    progress: number;
    caption: string;
    hasMatches: boolean;
}
