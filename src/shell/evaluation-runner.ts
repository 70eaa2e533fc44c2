import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { logger, type ILogger } from '../config/logger';
import {
    ConfigurationError,
    EvaluationCancelledError,
    EvaluationError,
    errorMessage
} from '../errors/evaluation-errors';
import type { IEvaluationOrchestrator } from '../services/evaluation-orchestrator.service';
import type { IPdfExtractor } from '../services/pdf-extractor.service';
import type { IReportRenderer } from '../services/report-renderer.service';
import type { IReportStore } from '../services/report-store.service';
import type { CandidateOutcome, CandidateProgressEvent, JobSpec, ReportDocument } from '../types/evaluation';

export type RunStatus = 'queued' | 'processing' | 'completed' | 'failed' | 'cancelled';

export interface EvaluationRequest {
    job: Omit<JobSpec, 'job_description'>;
    resumeFiles: string[];
    jobDescription?: string;
    jobDescriptionFile?: string;
}

/**
 * Everything one run needs, built per run around the operator's credential.
 */
export interface EvaluationPipeline {
    extractor: IPdfExtractor;
    orchestrator: IEvaluationOrchestrator;
    reportStore: IReportStore;
    renderer: IReportRenderer;
}

export type PipelineFactory = (apiKey: string) => EvaluationPipeline;

export interface RunProgress {
    processed: number;
    total: number;
    currentCandidate?: string;
    currentState?: CandidateProgressEvent['state'];
}

export interface RunSnapshot {
    id: string;
    status: RunStatus;
    createdAt: string;
    finishedAt?: string;
    progress: RunProgress;
    report?: ReportDocument;
    skipped: Array<{ file: string; candidate: string; errorKind?: string; reason?: string }>;
    pdfPath?: string;
    jsonPath?: string;
    error?: { kind: string; message: string };
}

export interface EvaluationRunnerOptions {
    reportDir: string;
    readTextFile?: (filePath: string) => Promise<string>;
    generateId?: () => string;
    clock?: () => Date;
}

export class RunInProgressError extends Error {
    constructor(readonly activeRunId: string) {
        super(`Evaluation ${activeRunId} is still running`);
        this.name = 'RunInProgressError';
    }
}

interface RunState {
    id: string;
    request: EvaluationRequest;
    status: RunStatus;
    createdAt: Date;
    finishedAt?: Date;
    progress: RunProgress;
    controller: AbortController;
    outcomes: CandidateOutcome[];
    report?: ReportDocument;
    pdfPath?: string;
    jsonPath?: string;
    error?: { kind: string; message: string };
    completion?: Promise<void>;
}

/**
 * `20261019_131502`, local time.
 */
export function reportTimestamp(date: Date): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Evaluation Runner
 *
 * Runs the pipeline in the background so HTTP handlers return at once,
 * and keeps run state in memory for polling. One run at a time; a finished
 * run is kept until the next one finishes.
 */
export class EvaluationRunner {
    private runs = new Map<string, RunState>();
    private readonly readTextFile: (filePath: string) => Promise<string>;
    private readonly generateId: () => string;
    private readonly clock: () => Date;

    constructor(
        private resolveApiKey: () => Promise<string | undefined>,
        private createPipeline: PipelineFactory,
        private logger: ILogger,
        private options: EvaluationRunnerOptions
    ) {
        this.readTextFile = options.readTextFile ?? (filePath => fs.promises.readFile(filePath, 'utf-8'));
        this.generateId = options.generateId ?? (() => crypto.randomUUID());
        this.clock = options.clock ?? (() => new Date());
    }

    static create(
        resolveApiKey: () => Promise<string | undefined>,
        createPipeline: PipelineFactory,
        reportDir: string
    ): EvaluationRunner {
        return new EvaluationRunner(resolveApiKey, createPipeline, logger, { reportDir });
    }

    /**
     * Validates the run-fatal preconditions, then starts the run in the background.
     */
    async start(request: EvaluationRequest): Promise<RunSnapshot> {
        if (request.resumeFiles.length === 0) {
            throw new ConfigurationError('Please upload at least one resume.');
        }

        const apiKey = await this.resolveApiKey();
        if (!apiKey) {
            throw new ConfigurationError('Completion API key is missing.');
        }

        const active = [...this.runs.values()].find(run => run.status === 'queued' || run.status === 'processing');
        if (active) {
            throw new RunInProgressError(active.id);
        }

        const pipeline = this.createPipeline(apiKey);
        const run: RunState = {
            id: this.generateId(),
            request,
            status: 'queued',
            createdAt: this.clock(),
            progress: { processed: 0, total: request.resumeFiles.length },
            controller: new AbortController(),
            outcomes: []
        };
        this.runs.set(run.id, run);

        this.logger.info({
            runId: run.id,
            role: request.job.title,
            resumes: request.resumeFiles.length
        }, 'Evaluation run queued');

        run.completion = this.execute(run, pipeline);
        return this.snapshot(run);
    }

    get(id: string): RunSnapshot | undefined {
        const run = this.runs.get(id);
        return run ? this.snapshot(run) : undefined;
    }

    /**
     * Cooperative: the candidate in flight finishes, no further ones start.
     */
    cancel(id: string): boolean {
        const run = this.runs.get(id);
        if (!run || (run.status !== 'queued' && run.status !== 'processing')) {
            return false;
        }
        run.controller.abort();
        this.logger.info({ runId: id }, 'Evaluation cancellation requested');
        return true;
    }

    async waitFor(id: string): Promise<RunSnapshot | undefined> {
        const run = this.runs.get(id);
        if (!run) {
            return undefined;
        }
        await run.completion;
        return this.snapshot(run);
    }

    private async execute(run: RunState, pipeline: EvaluationPipeline): Promise<void> {
        run.status = 'processing';

        try {
            const jobDescription = await this.resolveJobDescription(run.request, pipeline.extractor);
            const job: JobSpec = jobDescription
                ? { ...run.request.job, job_description: jobDescription }
                : { ...run.request.job };

            const result = await pipeline.orchestrator.evaluate(run.request.resumeFiles, job, {
                signal: run.controller.signal,
                onProgress: event => this.trackProgress(run, event)
            });
            run.report = result.report;
            run.outcomes = [...result.outcomes];

            const stamp = reportTimestamp(this.clock());
            const jsonPath = path.join(this.options.reportDir, `evaluation_report_${stamp}.json`);
            try {
                run.jsonPath = await pipeline.reportStore.saveJson(result.report, jsonPath);
            } catch (error: unknown) {
                this.logger.warn({ runId: run.id, jsonPath, error: errorMessage(error) }, 'Could not save JSON report');
            }

            run.pdfPath = await pipeline.renderer.render(
                result.report,
                path.join(this.options.reportDir, `evaluation_report_${stamp}.pdf`)
            );
            run.status = 'completed';

            this.logger.info({
                runId: run.id,
                evaluated: result.report.total_candidates,
                pdfPath: run.pdfPath
            }, 'Evaluation run completed');

        } catch (error: unknown) {
            run.status = error instanceof EvaluationCancelledError ? 'cancelled' : 'failed';
            run.error = {
                kind: error instanceof EvaluationError ? error.kind : 'internal',
                message: errorMessage(error)
            };

            this.logger.error({
                runId: run.id,
                status: run.status,
                error: run.error.message
            }, 'Evaluation run ended without a report');
        } finally {
            run.finishedAt = this.clock();
            this.pruneFinishedRuns(run.id);
        }
    }

    // Only the latest finished run stays available for polling and download
    private pruneFinishedRuns(latestId: string): void {
        for (const [id, run] of this.runs) {
            if (id !== latestId && run.status !== 'queued' && run.status !== 'processing') {
                this.runs.delete(id);
            }
        }
    }

    private trackProgress(run: RunState, event: CandidateProgressEvent): void {
        const finished = event.state === 'recorded' || event.state === 'skipped';
        run.progress = {
            processed: finished ? event.index + 1 : event.index,
            total: event.total,
            currentCandidate: event.source.display_name,
            currentState: event.state
        };
    }

    /**
     * Inline text wins over a file. An unreadable file is logged and ignored.
     */
    private async resolveJobDescription(request: EvaluationRequest, extractor: IPdfExtractor): Promise<string | undefined> {
        if (request.jobDescription?.trim()) {
            return request.jobDescription.trim();
        }

        const file = request.jobDescriptionFile;
        if (!file) {
            return undefined;
        }

        if (path.extname(file).toLowerCase() === '.pdf') {
            const extracted = await extractor.extract(file);
            if (extracted.ok) {
                return extracted.value.trim();
            }
            this.logger.warn({ file, error: extracted.error.message }, 'Could not read job description file');
            return undefined;
        }

        try {
            const text = (await this.readTextFile(file)).trim();
            return text || undefined;
        } catch (error: unknown) {
            this.logger.warn({ file, error: errorMessage(error) }, 'Could not read job description file');
            return undefined;
        }
    }

    private snapshot(run: RunState): RunSnapshot {
        return {
            id: run.id,
            status: run.status,
            createdAt: run.createdAt.toISOString(),
            finishedAt: run.finishedAt?.toISOString(),
            progress: { ...run.progress },
            report: run.report,
            skipped: run.outcomes
                .filter(outcome => outcome.state === 'skipped')
                .map(outcome => ({
                    file: outcome.source.file_path,
                    candidate: outcome.source.display_name,
                    errorKind: outcome.error_kind,
                    reason: outcome.reason
                })),
            pdfPath: run.pdfPath,
            jsonPath: run.jsonPath,
            error: run.error ? { ...run.error } : undefined
        };
    }
}
