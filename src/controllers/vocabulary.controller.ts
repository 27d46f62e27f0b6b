import type { Request, Response } from "express";
import HelperService from "../services/helper.service";
import type VocabularyService from "../services/vocabulary.service";

class VocabularyController {
    constructor(private readonly vocabulary: VocabularyService) { }

    getStats = (_req: Request, res: Response) => {
        try {
            return res.status(200).json({
                success: true,
                message: "Vocabulary stats fetched successfully",
                data: this.vocabulary.stats()
            });
        } catch (error) {
            return HelperService.sendError(res, error, "VocabularyStats");
        }
    };

    reload = async (_req: Request, res: Response) => {
        try {
            await this.vocabulary.load();
            return res.status(200).json({
                success: true,
                message: "Vocabulary reloaded successfully",
                data: this.vocabulary.stats()
            });
        } catch (error) {
            return HelperService.sendError(res, error, "VocabularyReload");
        }
    };
}

export default VocabularyController;
