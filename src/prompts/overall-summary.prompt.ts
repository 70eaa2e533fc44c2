import type { Evaluation } from '../types/evaluation';

export const SUMMARY_SYSTEM_PROMPT = 'You are an expert HR analyst providing clear, concise summaries.';

export const SUMMARY_WORDS = 80;
export const SUMMARY_EXCERPT_LENGTH = 100;

export const NO_CANDIDATES_SUMMARY = 'No candidates were evaluated.';

export function singleCandidateSummary(candidate: Evaluation): string {
    return `${candidate.candidate_name} is the only candidate evaluated with a match score of ${candidate.match_score}/100.`;
}

export function fallbackSummary(topCandidate: Evaluation): string {
    return `${topCandidate.candidate_name} ranks highest with a score of ${topCandidate.match_score}/100, demonstrating the strongest alignment with role requirements across all evaluation criteria.`;
}

/**
 * Cross-candidate comparison prompt, used only when two or more candidates were scored.
 */
export function buildSummaryPrompt(evaluations: readonly Evaluation[], jobTitle: string): string {
    const candidatesInfo = evaluations
        .map(evaluation =>
            `- ${evaluation.candidate_name}: ${evaluation.match_score}/100 - ${evaluation.rating_summary.slice(0, SUMMARY_EXCERPT_LENGTH)}`)
        .join('\n');

    return `Based on the following candidate evaluations for the ${jobTitle} role, write a concise ${SUMMARY_WORDS}-word overall summary comparing all candidates and providing a final recommendation.

CANDIDATES:
${candidatesInfo}

Provide an ${SUMMARY_WORDS}-word summary that:
1. Compares the candidates
2. Highlights the top candidate and why
3. Notes key differentiators
4. Provides a clear recommendation

Respond with ONLY the ${SUMMARY_WORDS}-word summary text, no JSON, no formatting.`;
}
