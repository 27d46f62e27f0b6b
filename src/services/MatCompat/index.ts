export { TextNormalizer } from "./text/TextNormalizer";
export { StopwordFilter } from "./text/StopwordFilter";
export { STOPWORDS_ES } from "./data/Stopwords";
export { VocabIndexBuilder } from "./vocabulary/VocabIndexBuilder";
export { MatCompatScorer } from "./scoring/MatCompatScorer";
export { ScorePresenter } from "./scoring/ScorePresenter";
export { NumberUtils } from "./utils/NumberUtils";
