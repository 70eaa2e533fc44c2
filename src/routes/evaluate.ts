import { Router, type Request, type Response } from "express";
import path from "path";
import { z } from "zod";
import { logger } from "../config/logger";
import { ConfigurationError } from "../errors/evaluation-errors";
import { EvaluationRunner, RunInProgressError } from "../shell/evaluation-runner";

export function isWithinDirectory(filePath: string, directory: string): boolean {
    const relative = path.relative(path.resolve(directory), path.resolve(filePath));
    return relative !== '' && relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative);
}

/**
 * Validation schema for evaluate request. File paths must point into the
 * upload storage directory.
 */
export function createEvaluateSchema(storageDir: string) {
    const storedFile = z.string().min(1).refine(
        filePath => isWithinDirectory(filePath, storageDir),
        { message: "File must be an uploaded file" }
    );

    return z.object({
        jobTitle: z.string().trim().min(1, "Please enter a role title"),
        company: z.string().trim().default(''),
        department: z.string().trim().default(''),
        location: z.string().trim().default(''),
        workMode: z.string().trim().default(''),
        jobDescription: z.string().optional(),
        jobDescriptionFile: storedFile.optional(),
        resumeFiles: z.array(storedFile).min(1, "Please upload at least one resume")
    });
}

/**
 * Evaluation routes
 *
 * POST /evaluate        start a run in the background
 * DELETE /evaluate/:id  request cancellation between candidates
 */
export function evaluateRoutes(runner: EvaluationRunner, storageDir: string): Router {
    const router = Router();
    const evaluateSchema = createEvaluateSchema(storageDir);

    /**
     * Body: { jobTitle, company?, department?, location?, workMode?,
     *         jobDescription?, jobDescriptionFile?, resumeFiles: string[] }
     * Returns: { id: string, status: string }
     */
    router.post('/', async (req: Request, res: Response) => {
        try {
            const validatedData = evaluateSchema.parse(req.body);

            const run = await runner.start({
                job: {
                    title: validatedData.jobTitle,
                    company: validatedData.company || 'Company',
                    department: validatedData.department || 'Department',
                    location: validatedData.location,
                    work_mode: validatedData.workMode
                },
                resumeFiles: validatedData.resumeFiles,
                jobDescription: validatedData.jobDescription,
                jobDescriptionFile: validatedData.jobDescriptionFile
            });

            res.status(202).json({
                id: run.id,
                status: run.status
            });

        } catch (error: unknown) {
            if (error instanceof z.ZodError) {
                return res.status(400).json({
                    error: 'Validation failed',
                    details: error.errors
                });
            }

            if (error instanceof ConfigurationError) {
                return res.status(400).json({ error: error.message });
            }

            if (error instanceof RunInProgressError) {
                return res.status(409).json({
                    error: error.message,
                    activeRunId: error.activeRunId
                });
            }

            logger.error({ error: error instanceof Error ? error.message : 'Unknown error' }, 'Evaluation request failed');
            res.status(500).json({
                error: 'Evaluation request failed',
                message: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    });

    router.delete('/:id', (req: Request, res: Response) => {
        if (!runner.get(req.params.id)) {
            return res.status(404).json({ error: 'Evaluation not found' });
        }

        const cancelled = runner.cancel(req.params.id);
        res.status(cancelled ? 202 : 409).json({
            id: req.params.id,
            cancelled
        });
    });

    return router;
}
