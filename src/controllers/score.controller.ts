import type { Request, Response } from "express";
import HelperService from "../services/helper.service";
import type VocabularyService from "../services/vocabulary.service";
import { MatCompatScorer, ScorePresenter } from "../services/MatCompat";

class ScoreController {
    constructor(
        private readonly vocabulary: VocabularyService,
        private readonly maxTextLength: number
    ) { }

    scoreText = (req: Request, res: Response) => {
        try {
            const body: unknown = req.body;
            const text = typeof body === "object" && body !== null && "text" in body ? body.text : undefined;

            if (!HelperService.isNonBlankString(text)) {
                return res.status(400).json({
                    success: false,
                    message: "Please provide a text to analyze",
                    data: null
                });
            }
            if (text.length > this.maxTextLength) {
                return res.status(413).json({
                    success: false,
                    message: `Text exceeds ${this.maxTextLength} characters`,
                    data: null
                });
            }

            // One snapshot for the whole call, even if a reload lands meanwhile
            const snapshot = this.vocabulary.current();
            const result = MatCompatScorer.score(text, snapshot.index);

            return res.status(200).json({
                success: true,
                message: result.matchedTokens > 0
                    ? "Text analyzed successfully"
                    : "No vocabulary terms were detected in the text",
                data: ScorePresenter.present(result)
            });
        } catch (error) {
            return HelperService.sendError(res, error, "ScoreText");
        }
    };
}

export default ScoreController;
