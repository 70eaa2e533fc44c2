import type {
    Evaluation,
    JobSpec,
    NumberedEvaluation,
    PersistedReport,
    ReportDocument,
    ReportHeader
} from '../types/evaluation';

export const ASSESSMENT_METHOD =
    'This report provides an AI-assisted evaluation of candidates against the role requirements. ' +
    'It summarizes estimated role fit, highlights strengths and potential risks, and presents a ' +
    'structured match score to support HR and hiring manager decisions.';

const MONTHS = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December'
];

/**
 * `19 October 2026`, day zero-padded, local time.
 */
export function formatReportDate(date: Date): string {
    const day = String(date.getDate()).padStart(2, '0');
    return `${day} ${MONTHS[date.getMonth()]} ${date.getFullYear()}`;
}

export function buildReportHeader(job: JobSpec, generatedAt: Date): ReportHeader {
    return {
        role: job.title,
        department: job.department,
        company: job.company,
        location: job.location,
        work_mode: job.work_mode,
        report_date: formatReportDate(generatedAt),
        assessment_method: ASSESSMENT_METHOD
    };
}

export function buildReportDocument(
    job: JobSpec,
    rankedCandidates: readonly Evaluation[],
    overallSummary: string,
    generatedAt: Date
): ReportDocument {
    return Object.freeze({
        report_header: Object.freeze(buildReportHeader(job, generatedAt)),
        candidates: Object.freeze([...rankedCandidates]),
        overall_summary: overallSummary,
        total_candidates: rankedCandidates.length
    });
}

/**
 * 1-based display numbers, assigned on copies so the report stays untouched.
 */
export function numberCandidates(candidates: readonly Evaluation[]): NumberedEvaluation[] {
    return candidates.map((candidate, index) => ({
        ...candidate,
        strengths: [...candidate.strengths],
        potential_gaps: [...candidate.potential_gaps],
        candidate_number: index + 1
    }));
}

export function toPersistedReport(report: ReportDocument): PersistedReport {
    return {
        report_header: { ...report.report_header },
        candidates: numberCandidates(report.candidates),
        overall_summary: report.overall_summary,
        total_candidates: report.total_candidates
    };
}
