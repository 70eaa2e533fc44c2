import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EvaluationOrchestrator } from '../../../src/services/evaluation-orchestrator.service';
import {
    type CompletionProfile,
    type CompletionResult,
    EVALUATION_PROFILE,
    SUMMARY_PROFILE
} from '../../../src/services/llm-client.service';
import {
    EvaluationCancelledError,
    ExtractionError,
    MalformedResponseError,
    TransportError
} from '../../../src/errors/evaluation-errors';
import type { CandidateProgressEvent, Evaluation, JobSpec } from '../../../src/types/evaluation';
import { failure, success } from '../../../src/types/result';

const mockExtractor = {
    extract: vi.fn()
};

const mockLLM = {
    complete: vi.fn()
};

const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
};

const job: JobSpec = {
    title: 'Data Engineer',
    company: 'Acme',
    department: 'Analytics',
    location: 'Remote',
    work_mode: 'Remote'
};

const generatedAt = new Date(2026, 9, 5, 14, 30, 0);

function scored(name: string, score: number): Evaluation {
    return testUtils.generateMockEvaluation({ candidate_name: name, match_score: score });
}

/**
 * Evaluations keyed by the display name that appears in the prompt.
 */
function llmReturning(byName: Record<string, CompletionResult<Evaluation>>, summary?: CompletionResult<string>) {
    return async (prompt: string, profile: CompletionProfile<unknown>) => {
        if (profile === SUMMARY_PROFILE) {
            return summary ?? { ok: true, value: 'Comparative summary.', attempts: 1 };
        }
        const match = /"candidate_name": "([^"]+)"/.exec(prompt);
        const result = match ? byName[match[1]] : undefined;
        if (!result) {
            throw new Error(`Unexpected prompt for ${match?.[1]}`);
        }
        return result;
    };
}

describe('Evaluation Orchestrator - Dependency Injection Tests', () => {
    let orchestrator: EvaluationOrchestrator;

    beforeEach(() => {
        vi.clearAllMocks();
        mockExtractor.extract.mockReset();
        mockLLM.complete.mockReset();
        mockExtractor.extract.mockImplementation(async (filePath: string) => success(`CV text of ${filePath}`));
        orchestrator = new EvaluationOrchestrator(mockExtractor, mockLLM, mockLogger, {
            maxRetries: 3,
            clock: () => generatedAt
        });
    });

    it('should create orchestrator with factory method', () => {
        expect(EvaluationOrchestrator.create(mockExtractor, mockLLM, 3)).toBeInstanceOf(EvaluationOrchestrator);
    });

    describe('evaluate', () => {
        it('should rank recorded candidates by score, highest first', async () => {
            mockLLM.complete.mockImplementation(llmReturning({
                'Bob Stone': { ok: true, value: scored('Bob Stone', 62), attempts: 1 },
                'Ada King': { ok: true, value: scored('Ada King', 91), attempts: 1 },
                'Cy Young': { ok: true, value: scored('Cy Young', 75), attempts: 2 }
            }));

            const { report, outcomes } = await orchestrator.evaluate(
                ['/cv/Bob_Stone.pdf', '/cv/Ada-King.pdf', '/cv/Cy_Young.pdf'],
                job
            );

            expect(report.candidates.map(c => c.candidate_name)).toEqual(['Ada King', 'Cy Young', 'Bob Stone']);
            expect(report.total_candidates).toBe(3);
            expect(report.overall_summary).toBe('Comparative summary.');
            expect(report.report_header).toEqual(expect.objectContaining({
                role: 'Data Engineer',
                company: 'Acme',
                report_date: '05 October 2026'
            }));
            expect(outcomes.map(o => o.state)).toEqual(['recorded', 'recorded', 'recorded']);
        });

        it('should pass the prompt, evaluation profile and retry budget to the LLM', async () => {
            mockLLM.complete.mockImplementation(llmReturning({
                'Ada King': { ok: true, value: scored('Ada King', 80), attempts: 1 }
            }));

            await orchestrator.evaluate(['/cv/Ada_King.pdf'], job);

            expect(mockExtractor.extract).toHaveBeenCalledWith('/cv/Ada_King.pdf');
            expect(mockLLM.complete).toHaveBeenCalledTimes(1);
            expect(mockLLM.complete).toHaveBeenCalledWith(
                expect.stringContaining('**CANDIDATE CV:**\nCV text of /cv/Ada_King.pdf\n'),
                EVALUATION_PROFILE,
                3
            );
        });

        it('should skip a candidate whose extraction fails without affecting the others', async () => {
            mockExtractor.extract.mockImplementation(async (filePath: string) =>
                filePath === '/cv/Scan_Only.pdf'
                    ? failure(new ExtractionError('PDF contains no extractable text: /cv/Scan_Only.pdf', filePath))
                    : success('CV text'));
            mockLLM.complete.mockImplementation(llmReturning({
                'Ada King': { ok: true, value: scored('Ada King', 70), attempts: 1 },
                'Cy Young': { ok: true, value: scored('Cy Young', 85), attempts: 1 }
            }));

            const { report, outcomes } = await orchestrator.evaluate(
                ['/cv/Ada_King.pdf', '/cv/Scan_Only.pdf', '/cv/Cy_Young.pdf'],
                job
            );

            expect(report.total_candidates).toBe(2);
            expect(report.candidates.map(c => c.candidate_name)).toEqual(['Cy Young', 'Ada King']);
            expect(outcomes[1]).toEqual({
                source: { file_path: '/cv/Scan_Only.pdf', display_name: 'Scan Only' },
                state: 'skipped',
                error_kind: 'extraction',
                reason: 'PDF contains no extractable text: /cv/Scan_Only.pdf'
            });
            expect(mockLLM.complete).toHaveBeenCalledTimes(3);
        });

        it('should skip a candidate whose completion fails', async () => {
            mockLLM.complete.mockImplementation(llmReturning({
                'Ada King': { ok: true, value: scored('Ada King', 70), attempts: 1 },
                'Bob Stone': {
                    ok: false,
                    error: new MalformedResponseError('Completion is not valid JSON', 'nope'),
                    attempts: 3
                }
            }));

            const { report, outcomes } = await orchestrator.evaluate(['/cv/Ada_King.pdf', '/cv/Bob_Stone.pdf'], job);

            expect(report.total_candidates).toBe(1);
            expect(report.overall_summary).toBe('Ada King is the only candidate evaluated with a match score of 70/100.');
            expect(outcomes[1].error_kind).toBe('malformed_response');
            expect(mockLogger.info).toHaveBeenCalledWith(
                expect.objectContaining({ evaluated: 1, skipped: 1, skippedFiles: ['/cv/Bob_Stone.pdf'] }),
                'Candidate evaluation completed'
            );
        });

        it('should keep processing order for equal scores', async () => {
            mockLLM.complete.mockImplementation(llmReturning({
                'First': { ok: true, value: scored('First', 80), attempts: 1 },
                'Second': { ok: true, value: scored('Second', 80), attempts: 1 },
                'Third': { ok: true, value: scored('Third', 90), attempts: 1 }
            }));

            const { report } = await orchestrator.evaluate(['/cv/First.pdf', '/cv/Second.pdf', '/cv/Third.pdf'], job);

            expect(report.candidates.map(c => c.candidate_name)).toEqual(['Third', 'First', 'Second']);
        });

        it('should produce an empty report when no files are given', async () => {
            const { report, outcomes } = await orchestrator.evaluate([], job);

            expect(report.candidates).toEqual([]);
            expect(report.total_candidates).toBe(0);
            expect(report.overall_summary).toBe('No candidates were evaluated.');
            expect(outcomes).toEqual([]);
            expect(mockLLM.complete).not.toHaveBeenCalled();
        });

        it('should report each candidate state in order', async () => {
            mockLLM.complete.mockImplementation(llmReturning({
                'Ada King': { ok: true, value: scored('Ada King', 70), attempts: 1 }
            }));
            const events: CandidateProgressEvent[] = [];

            await orchestrator.evaluate(['/cv/Ada_King.pdf'], job, { onProgress: event => events.push(event) });

            expect(events.map(e => e.state)).toEqual(['extracting', 'prompting', 'awaiting_completion', 'recorded']);
            expect(events[0]).toEqual({
                index: 0,
                total: 1,
                source: { file_path: '/cv/Ada_King.pdf', display_name: 'Ada King' },
                state: 'extracting'
            });
        });

        it('should stop before the next candidate once cancelled', async () => {
            const controller = new AbortController();
            mockLLM.complete.mockImplementation(async () => {
                controller.abort();
                return { ok: true, value: scored('Ada King', 70), attempts: 1 };
            });

            const pending = orchestrator.evaluate(['/cv/Ada_King.pdf', '/cv/Bob_Stone.pdf'], job, {
                signal: controller.signal
            });

            await expect(pending).rejects.toBeInstanceOf(EvaluationCancelledError);
            await expect(pending).rejects.toThrow('Evaluation cancelled after 1 candidate(s)');
            expect(mockExtractor.extract).toHaveBeenCalledTimes(1);
        });
    });

    describe('generateOverallSummary', () => {
        it('should return the fixed text for no candidates', async () => {
            expect(await orchestrator.generateOverallSummary([], 'Data Engineer')).toBe('No candidates were evaluated.');
        });

        it('should describe a single candidate without calling the LLM', async () => {
            const summary = await orchestrator.generateOverallSummary([scored('Ada', 88)], 'Data Engineer');

            expect(summary).toBe('Ada is the only candidate evaluated with a match score of 88/100.');
            expect(mockLLM.complete).not.toHaveBeenCalled();
        });

        it('should ask the LLM once to compare several candidates', async () => {
            mockLLM.complete.mockResolvedValue({ ok: true, value: 'Ada edges out Grace.', attempts: 1 });

            const summary = await orchestrator.generateOverallSummary(
                [scored('Ada', 88), scored('Grace', 80)],
                'Data Engineer'
            );

            expect(summary).toBe('Ada edges out Grace.');
            expect(mockLLM.complete).toHaveBeenCalledWith(
                expect.stringContaining('- Ada: 88/100 - '),
                SUMMARY_PROFILE,
                1
            );
        });

        it('should fall back to a sentence about the leader when the LLM fails', async () => {
            mockLLM.complete.mockResolvedValue({ ok: false, error: new TransportError('timeout'), attempts: 1 });

            const summary = await orchestrator.generateOverallSummary(
                [scored('Ada', 88), scored('Grace', 80)],
                'Data Engineer'
            );

            expect(summary).toBe(
                'Ada ranks highest with a score of 88/100, demonstrating the strongest alignment with role requirements across all evaluation criteria.'
            );
            expect(mockLogger.warn).toHaveBeenCalledWith(
                { errorKind: 'transport', error: 'timeout' },
                'Overall summary generation failed, using fallback'
            );
        });
    });
});
