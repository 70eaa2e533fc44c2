import { logger, type ILogger } from '../config/logger';
import { EvaluationCancelledError } from '../errors/evaluation-errors';
import { buildEvaluationPrompt } from '../prompts/candidate-evaluation.prompt';
import {
    NO_CANDIDATES_SUMMARY,
    buildSummaryPrompt,
    fallbackSummary,
    singleCandidateSummary
} from '../prompts/overall-summary.prompt';
import { buildReportDocument } from '../reports/report-document';
import type {
    CandidateOutcome,
    CandidateProgressEvent,
    CandidateSource,
    CandidateState,
    Evaluation,
    EvaluationRun,
    JobSpec
} from '../types/evaluation';
import { toCandidateSource } from '../utils/candidate-source.util';
import { EVALUATION_PROFILE, type ILLMClient, SUMMARY_PROFILE } from './llm-client.service';
import type { IPdfExtractor } from './pdf-extractor.service';

export interface EvaluateOptions {
    signal?: AbortSignal;
    onProgress?: (event: CandidateProgressEvent) => void;
}

export interface OrchestratorOptions {
    maxRetries: number;
    // The summary is attempted once before the fallback sentence is used
    summaryMaxRetries?: number;
    clock?: () => Date;
}

export interface IEvaluationOrchestrator {
    evaluate(files: readonly string[], job: JobSpec, options?: EvaluateOptions): Promise<EvaluationRun>;
}

/**
 * Evaluation Orchestrator with Dependency Injection
 *
 * Scores candidates one at a time in input order:
 * extract text, build the prompt, ask the LLM, record or skip.
 * Then ranks the recorded evaluations, writes the overall summary and
 * assembles the report document. Per-candidate failures never end the run.
 */
export class EvaluationOrchestrator implements IEvaluationOrchestrator {
    private readonly clock: () => Date;

    constructor(
        private extractor: IPdfExtractor,
        private llm: ILLMClient,
        private logger: ILogger,
        private options: OrchestratorOptions
    ) {
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Factory method for production use
     */
    static create(extractor: IPdfExtractor, llm: ILLMClient, maxRetries: number): EvaluationOrchestrator {
        return new EvaluationOrchestrator(extractor, llm, logger, { maxRetries });
    }

    async evaluate(files: readonly string[], job: JobSpec, options: EvaluateOptions = {}): Promise<EvaluationRun> {
        const sources = files.map(toCandidateSource);
        const evaluations: Evaluation[] = [];
        const outcomes: CandidateOutcome[] = [];

        this.logger.info({
            role: job.title,
            company: job.company,
            candidates: sources.length
        }, 'Starting candidate evaluation');

        for (const [index, source] of sources.entries()) {
            if (options.signal?.aborted) {
                this.logger.warn({ processed: index, total: sources.length }, 'Evaluation cancelled');
                throw new EvaluationCancelledError(index);
            }

            const report = (state: CandidateState) =>
                options.onProgress?.({ index, total: sources.length, source, state });

            const outcome = await this.evaluateCandidate(source, job, report);
            outcomes.push(outcome.outcome);
            if (outcome.evaluation) {
                evaluations.push(outcome.evaluation);
            }
            report(outcome.outcome.state);
        }

        // Array.prototype.sort is stable, so ties keep processing order
        const ranked = [...evaluations].sort((a, b) => b.match_score - a.match_score);

        const overallSummary = await this.generateOverallSummary(ranked, job.title);
        const reportDocument = buildReportDocument(job, ranked, overallSummary, this.clock());

        const skipped = outcomes.filter(outcome => outcome.state === 'skipped');
        this.logger.info({
            role: job.title,
            evaluated: ranked.length,
            skipped: skipped.length,
            skippedFiles: skipped.map(outcome => outcome.source.file_path)
        }, 'Candidate evaluation completed');

        return { report: reportDocument, outcomes };
    }

    /**
     * None: fixed text. One: a sentence about that candidate, no LLM call.
     * Two or more: LLM comparison, falling back to a sentence about the leader.
     */
    async generateOverallSummary(ranked: readonly Evaluation[], jobTitle: string): Promise<string> {
        if (ranked.length === 0) {
            return NO_CANDIDATES_SUMMARY;
        }

        if (ranked.length === 1) {
            return singleCandidateSummary(ranked[0]);
        }

        const result = await this.llm.complete(
            buildSummaryPrompt(ranked, jobTitle),
            SUMMARY_PROFILE,
            this.options.summaryMaxRetries ?? 1
        );

        if (result.ok) {
            return result.value;
        }

        this.logger.warn({
            errorKind: result.error.kind,
            error: result.error.message
        }, 'Overall summary generation failed, using fallback');

        return fallbackSummary(ranked[0]);
    }

    private async evaluateCandidate(
        source: CandidateSource,
        job: JobSpec,
        report: (state: CandidateState) => void
    ): Promise<{ outcome: CandidateOutcome; evaluation?: Evaluation }> {
        this.logger.info({ filePath: source.file_path, candidate: source.display_name }, 'Processing candidate');

        report('extracting');
        const extracted = await this.extractor.extract(source.file_path);
        if (!extracted.ok) {
            return { outcome: this.skip(source, extracted.error.kind, extracted.error.message) };
        }

        report('prompting');
        const prompt = buildEvaluationPrompt(extracted.value, source.display_name, job);

        report('awaiting_completion');
        const result = await this.llm.complete(prompt, EVALUATION_PROFILE, this.options.maxRetries);
        if (!result.ok) {
            return { outcome: this.skip(source, result.error.kind, result.error.message) };
        }

        this.logger.info({
            candidate: result.value.candidate_name,
            matchScore: result.value.match_score,
            attempts: result.attempts
        }, 'Candidate evaluated');

        return {
            outcome: { source, state: 'recorded' },
            evaluation: result.value
        };
    }

    private skip(source: CandidateSource, errorKind: string, reason: string): CandidateOutcome {
        this.logger.warn({
            filePath: source.file_path,
            candidate: source.display_name,
            errorKind,
            reason
        }, 'Candidate skipped');

        return { source, state: 'skipped', error_kind: errorKind, reason };
    }
}
