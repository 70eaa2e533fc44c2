import { Router, type Request, type Response } from "express";
import { logger } from "../config/logger";
import { toPersistedReport } from "../reports/report-document";
import { EvaluationRunner } from "../shell/evaluation-runner";

export const DOWNLOAD_FILE_NAME = 'talent_evaluation_report.pdf';

/**
 * Result routes
 *
 * GET /result/:id         run status, progress and, once completed, the report
 * GET /result/:id/report  the rendered PDF
 */
export function resultRoutes(runner: EvaluationRunner): Router {
    const router = Router();

    router.get('/:id', (req: Request, res: Response) => {
        const run = runner.get(req.params.id);

        if (!run) {
            return res.status(404).json({
                error: 'Evaluation not found'
            });
        }

        if (run.status === 'queued' || run.status === 'processing') {
            return res.json({
                id: run.id,
                status: run.status,
                progress: run.progress
            });
        }

        if (run.status === 'failed' || run.status === 'cancelled') {
            return res.status(run.status === 'failed' ? 500 : 200).json({
                id: run.id,
                status: run.status,
                error: run.error,
                skipped: run.skipped
            });
        }

        logger.info({
            runId: run.id,
            status: run.status
        }, 'Results retrieved');

        return res.json({
            id: run.id,
            status: run.status,
            result: run.report ? toPersistedReport(run.report) : undefined,
            skipped: run.skipped,
            reportAvailable: Boolean(run.pdfPath)
        });
    });

    router.get('/:id/report', (req: Request, res: Response) => {
        const run = runner.get(req.params.id);

        if (!run || !run.pdfPath) {
            return res.status(404).json({
                error: 'PDF report not found'
            });
        }

        res.download(run.pdfPath, DOWNLOAD_FILE_NAME, (error) => {
            if (error) {
                logger.error({ runId: run.id, error: error.message }, 'Report download failed');
            }
        });
    });

    return router;
}
