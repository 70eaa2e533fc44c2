import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import * as path from 'path';
import {
    type EvaluationPipeline,
    EvaluationRunner,
    RunInProgressError,
    reportTimestamp
} from '../../../src/shell/evaluation-runner';
import {
    ConfigurationError,
    EvaluationCancelledError,
    ExtractionError,
    RenderError
} from '../../../src/errors/evaluation-errors';
import { buildReportDocument } from '../../../src/reports/report-document';
import type { EvaluationRun, JobSpec } from '../../../src/types/evaluation';
import { failure, success } from '../../../src/types/result';

vi.mock('pdf-parse', () => ({
    default: vi.fn().mockResolvedValue({ text: 'PDF text content' })
}));

const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn()
};

const job = {
    title: 'Backend Engineer',
    company: 'Acme',
    department: 'Platform',
    location: 'Remote',
    work_mode: 'Remote'
};

const now = new Date(2026, 9, 19, 13, 15, 2);
const stamp = '20261019_131502';

function completedRun(jobSpec: JobSpec): EvaluationRun {
    return {
        report: buildReportDocument(jobSpec, [testUtils.generateMockEvaluation()], 'Jane Doe is the only candidate.', now),
        outcomes: [
            { source: { file_path: '/cv/Jane_Doe.pdf', display_name: 'Jane Doe' }, state: 'recorded' },
            {
                source: { file_path: '/cv/Scan.pdf', display_name: 'Scan' },
                state: 'skipped',
                error_kind: 'extraction',
                reason: 'PDF contains no extractable text: /cv/Scan.pdf'
            }
        ]
    };
}

function createPipeline() {
    return {
        extractor: { extract: vi.fn() },
        orchestrator: { evaluate: vi.fn() },
        reportStore: { saveJson: vi.fn() },
        renderer: { render: vi.fn() }
    };
}

describe('Evaluation Runner', () => {
    let pipeline: ReturnType<typeof createPipeline>;
    let resolveApiKey: Mock<() => Promise<string | undefined>>;
    let pipelineFactory: Mock<(apiKey: string) => EvaluationPipeline>;
    let readTextFile: Mock<(filePath: string) => Promise<string>>;
    let runner: EvaluationRunner;

    beforeEach(() => {
        vi.clearAllMocks();
        pipeline = createPipeline();
        pipeline.orchestrator.evaluate.mockImplementation(async (_files: string[], jobSpec: JobSpec) => completedRun(jobSpec));
        pipeline.reportStore.saveJson.mockImplementation(async (_report: unknown, outputPath: string) => outputPath);
        pipeline.renderer.render.mockImplementation(async (_report: unknown, outputPath: string) => outputPath);

        resolveApiKey = vi.fn<() => Promise<string | undefined>>().mockResolvedValue('test-secret');
        pipelineFactory = vi.fn<(apiKey: string) => EvaluationPipeline>().mockReturnValue(pipeline);
        readTextFile = vi.fn<(filePath: string) => Promise<string>>();

        let counter = 0;
        runner = new EvaluationRunner(resolveApiKey, pipelineFactory, mockLogger, {
            reportDir: '/reports',
            readTextFile,
            generateId: () => `run-${++counter}`,
            clock: () => now
        });
    });

    it('should format report timestamps', () => {
        expect(reportTimestamp(now)).toBe(stamp);
    });

    describe('start', () => {
        it('should reject a request without resumes', async () => {
            await expect(runner.start({ job, resumeFiles: [] }))
                .rejects.toThrow(new ConfigurationError('Please upload at least one resume.'));
            expect(resolveApiKey).not.toHaveBeenCalled();
        });

        it('should reject a request when no API key is configured', async () => {
            resolveApiKey.mockResolvedValue(undefined);

            await expect(runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] }))
                .rejects.toBeInstanceOf(ConfigurationError);
            expect(pipelineFactory).not.toHaveBeenCalled();
        });

        it('should build the pipeline with the resolved key and return a processing snapshot', async () => {
            const snapshot = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf', '/cv/Scan.pdf'] });

            expect(pipelineFactory).toHaveBeenCalledWith('test-secret');
            expect(snapshot.id).toBe('run-1');
            expect(snapshot.status).toBe('processing');
            expect(snapshot.progress).toEqual({ processed: 0, total: 2 });
        });

        it('should refuse a second run while one is active', async () => {
            let release: (run: EvaluationRun) => void = () => undefined;
            pipeline.orchestrator.evaluate.mockReturnValue(new Promise<EvaluationRun>(resolve => { release = resolve; }));

            await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] });
            const second = runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] });

            await expect(second).rejects.toBeInstanceOf(RunInProgressError);
            await expect(second).rejects.toThrow('Evaluation run-1 is still running');

            release(completedRun(job));
            await runner.waitFor('run-1');
            await expect(runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] })).resolves.toMatchObject({ id: 'run-2' });
        });
    });

    describe('execution', () => {
        it('should save JSON and PDF reports and complete', async () => {
            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf', '/cv/Scan.pdf'] });
            const snapshot = await runner.waitFor(id);

            const jsonPath = path.join('/reports', `evaluation_report_${stamp}.json`);
            const pdfPath = path.join('/reports', `evaluation_report_${stamp}.pdf`);

            expect(snapshot?.status).toBe('completed');
            expect(snapshot?.jsonPath).toBe(jsonPath);
            expect(snapshot?.pdfPath).toBe(pdfPath);
            expect(snapshot?.report?.total_candidates).toBe(1);
            expect(snapshot?.finishedAt).toBe(now.toISOString());
            expect(snapshot?.skipped).toEqual([{
                file: '/cv/Scan.pdf',
                candidate: 'Scan',
                errorKind: 'extraction',
                reason: 'PDF contains no extractable text: /cv/Scan.pdf'
            }]);
            expect(pipeline.orchestrator.evaluate).toHaveBeenCalledWith(
                ['/cv/Jane_Doe.pdf', '/cv/Scan.pdf'],
                job,
                expect.objectContaining({ signal: expect.any(AbortSignal) })
            );
        });

        it('should still complete when the JSON report cannot be saved', async () => {
            pipeline.reportStore.saveJson.mockRejectedValue(new Error('ENOSPC: no space left on device'));

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] });
            const snapshot = await runner.waitFor(id);

            expect(snapshot?.status).toBe('completed');
            expect(snapshot?.jsonPath).toBeUndefined();
            expect(mockLogger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ runId: id, error: 'ENOSPC: no space left on device' }),
                'Could not save JSON report'
            );
        });

        it('should fail the run when the PDF cannot be rendered', async () => {
            pipeline.renderer.render.mockRejectedValue(
                new RenderError('Failed to render report: EACCES', '/reports/out.pdf')
            );

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] });
            const snapshot = await runner.waitFor(id);

            expect(snapshot?.status).toBe('failed');
            expect(snapshot?.error).toEqual({ kind: 'render', message: 'Failed to render report: EACCES' });
            expect(snapshot?.pdfPath).toBeUndefined();
        });

        it('should mark the run cancelled when the orchestrator stops early', async () => {
            pipeline.orchestrator.evaluate.mockRejectedValue(new EvaluationCancelledError(1));

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf', '/cv/Scan.pdf'] });
            const snapshot = await runner.waitFor(id);

            expect(snapshot?.status).toBe('cancelled');
            expect(snapshot?.error).toEqual({ kind: 'cancelled', message: 'Evaluation cancelled after 1 candidate(s)' });
            expect(pipeline.renderer.render).not.toHaveBeenCalled();
        });

        it('should track progress from orchestrator events', async () => {
            let release: (run: EvaluationRun) => void = () => undefined;
            pipeline.orchestrator.evaluate.mockImplementation((_files: string[], _job: JobSpec, options: {
                onProgress: (event: unknown) => void;
            }) => {
                options.onProgress({
                    index: 0,
                    total: 2,
                    source: { file_path: '/cv/Jane_Doe.pdf', display_name: 'Jane Doe' },
                    state: 'recorded'
                });
                options.onProgress({
                    index: 1,
                    total: 2,
                    source: { file_path: '/cv/Scan.pdf', display_name: 'Scan' },
                    state: 'awaiting_completion'
                });
                return new Promise<EvaluationRun>(resolve => { release = resolve; });
            });

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf', '/cv/Scan.pdf'] });
            await vi.waitFor(() => expect(runner.get(id)?.progress.currentCandidate).toBe('Scan'));

            expect(runner.get(id)?.progress).toEqual({
                processed: 1,
                total: 2,
                currentCandidate: 'Scan',
                currentState: 'awaiting_completion'
            });

            release(completedRun(job));
            await runner.waitFor(id);
        });
    });

    describe('cancel', () => {
        it('should abort the signal of an active run', async () => {
            let release: (run: EvaluationRun) => void = () => undefined;
            let signal: AbortSignal | undefined;
            pipeline.orchestrator.evaluate.mockImplementation((_files: string[], _job: JobSpec, options: { signal: AbortSignal }) => {
                signal = options.signal;
                return new Promise<EvaluationRun>(resolve => { release = resolve; });
            });

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] });
            await vi.waitFor(() => expect(signal).toBeDefined());

            expect(runner.cancel(id)).toBe(true);
            expect(signal?.aborted).toBe(true);

            release(completedRun(job));
            await runner.waitFor(id);
            expect(runner.cancel(id)).toBe(false);
        });

        it('should keep only the latest finished run', async () => {
            const first = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] });
            await runner.waitFor(first.id);
            const second = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'] });
            await runner.waitFor(second.id);

            expect(runner.get(first.id)).toBeUndefined();
            expect(runner.get(second.id)?.status).toBe('completed');
        });

        it('should report unknown runs', async () => {
            expect(runner.cancel('missing')).toBe(false);
            expect(runner.get('missing')).toBeUndefined();
            expect(await runner.waitFor('missing')).toBeUndefined();
        });
    });

    describe('job description', () => {
        it('should prefer inline text over a file', async () => {
            const { id } = await runner.start({
                job,
                resumeFiles: ['/cv/Jane_Doe.pdf'],
                jobDescription: '  Build the billing API.  ',
                jobDescriptionFile: '/uploads/jd.txt'
            });
            await runner.waitFor(id);

            expect(readTextFile).not.toHaveBeenCalled();
            expect(pipeline.orchestrator.evaluate).toHaveBeenCalledWith(
                ['/cv/Jane_Doe.pdf'],
                { ...job, job_description: 'Build the billing API.' },
                expect.anything()
            );
        });

        it('should read a text file', async () => {
            readTextFile.mockResolvedValue('Own the payments platform.\n');

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'], jobDescriptionFile: '/uploads/jd.txt' });
            await runner.waitFor(id);

            expect(readTextFile).toHaveBeenCalledWith('/uploads/jd.txt');
            expect(pipeline.orchestrator.evaluate).toHaveBeenCalledWith(
                ['/cv/Jane_Doe.pdf'],
                { ...job, job_description: 'Own the payments platform.' },
                expect.anything()
            );
        });

        it('should extract a PDF file', async () => {
            pipeline.extractor.extract.mockResolvedValue(success('Lead the data team.'));

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'], jobDescriptionFile: '/uploads/JD.PDF' });
            await runner.waitFor(id);

            expect(pipeline.extractor.extract).toHaveBeenCalledWith('/uploads/JD.PDF');
            expect(pipeline.orchestrator.evaluate).toHaveBeenCalledWith(
                ['/cv/Jane_Doe.pdf'],
                { ...job, job_description: 'Lead the data team.' },
                expect.anything()
            );
        });

        it('should continue without a description that cannot be read', async () => {
            pipeline.extractor.extract.mockResolvedValue(
                failure(new ExtractionError('PDF parsing failed for /uploads/jd.pdf: bad xref', '/uploads/jd.pdf'))
            );

            const { id } = await runner.start({ job, resumeFiles: ['/cv/Jane_Doe.pdf'], jobDescriptionFile: '/uploads/jd.pdf' });
            const snapshot = await runner.waitFor(id);

            expect(snapshot?.status).toBe('completed');
            expect(pipeline.orchestrator.evaluate).toHaveBeenCalledWith(['/cv/Jane_Doe.pdf'], job, expect.anything());
            expect(mockLogger.warn).toHaveBeenCalledWith(
                { file: '/uploads/jd.pdf', error: 'PDF parsing failed for /uploads/jd.pdf: bad xref' },
                'Could not read job description file'
            );
        });
    });
});
