/**
 * TypeScript interfaces for evaluation payloads
 *
 * Field names follow the persisted report JSON, which is also the shape the
 * completion endpoint is asked to produce for each candidate.
 */

// Role being hired for; fixed for the whole run
export interface JobSpec {
    readonly title: string;
    readonly company: string;
    readonly department: string;
    readonly location: string;
    readonly work_mode: string;
    readonly job_description?: string;
}

export interface CandidateSource {
    readonly file_path: string;
    readonly display_name: string;
}

// One LLM call, one fully validated result
export interface Evaluation {
    readonly candidate_name: string;
    readonly match_score: number;
    readonly rating_summary: string;
    readonly strengths: readonly string[];
    readonly potential_gaps: readonly string[];
}

export interface ReportHeader {
    readonly role: string;
    readonly department: string;
    readonly company: string;
    readonly location: string;
    readonly work_mode: string;
    readonly report_date: string;
    readonly assessment_method: string;
}

export interface ReportDocument {
    readonly report_header: ReportHeader;
    readonly candidates: readonly Evaluation[];
    readonly overall_summary: string;
    readonly total_candidates: number;
}

// Display-only numbering, assigned on a copy at render/persist time
export interface NumberedEvaluation extends Evaluation {
    readonly candidate_number: number;
}

export interface PersistedReport {
    report_header: ReportHeader;
    candidates: NumberedEvaluation[];
    overall_summary: string;
    total_candidates: number;
}

export type CandidateState =
    | 'pending'
    | 'extracting'
    | 'prompting'
    | 'awaiting_completion'
    | 'recorded'
    | 'skipped';

export interface CandidateOutcome {
    readonly source: CandidateSource;
    readonly state: Extract<CandidateState, 'recorded' | 'skipped'>;
    readonly error_kind?: string;
    readonly reason?: string;
}

export interface CandidateProgressEvent {
    readonly index: number;
    readonly total: number;
    readonly source: CandidateSource;
    readonly state: CandidateState;
}

export interface EvaluationRun {
    readonly report: ReportDocument;
    readonly outcomes: readonly CandidateOutcome[];
}
