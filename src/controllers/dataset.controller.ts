import type { Request, Response } from "express";
import HelperService from "../services/helper.service";
import type DatasetService from "../services/dataset.service";

const MAX_LIMIT = 100;
const MAX_TOP_N = 50;

class DatasetController {
    constructor(private readonly dataset: DatasetService) { }

    search = async (req: Request, res: Response) => {
        try {
            const { q, column, chartColumn } = req.query;
            if (!HelperService.isNonBlankString(q)) {
                return res.status(400).json({
                    success: false,
                    message: "Search text (q) is required",
                    data: null
                });
            }

            const limit = HelperService.parseBoundedInt(req.query.limit, 10, MAX_LIMIT);
            const topN = HelperService.parseBoundedInt(req.query.topN, 10, MAX_TOP_N);
            if (limit === null || topN === null) {
                return res.status(400).json({
                    success: false,
                    message: `limit must be between 1 and ${MAX_LIMIT}, topN between 1 and ${MAX_TOP_N}`,
                    data: null
                });
            }

            const result = await this.dataset.searchDataset({
                query: q,
                column: HelperService.isNonBlankString(column) ? column : "title_e",
                chartColumn: HelperService.isNonBlankString(chartColumn) ? chartColumn : "journal",
                limit,
                topN
            });

            return res.status(200).json({
                success: true,
                message: `${result.matched} results out of ${result.total}`,
                data: result
            });
        } catch (error) {
            return HelperService.sendError(res, error, "DatasetSearch");
        }
    };
}

export default DatasetController;
