import { z } from 'zod';
import type { ILogger } from '../config/logger';
import { MalformedResponseError } from '../errors/evaluation-errors';
import { REQUESTED_GAPS, REQUESTED_STRENGTHS } from '../prompts/candidate-evaluation.prompt';
import type { Evaluation } from '../types/evaluation';

/**
 * Zod schema for the per-candidate completion payload
 */
export const evaluationSchema = z.object({
    candidate_name: z.string().trim().min(1),
    match_score: z.number().finite(),
    rating_summary: z.string(),
    strengths: z.array(z.string()),
    potential_gaps: z.array(z.string())
});

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

/**
 * Remove a leading ```json / ``` fence and a trailing ``` fence.
 */
export function stripCodeFences(content: string): string {
    let cleaned = content.trim();
    if (cleaned.startsWith('```json')) {
        cleaned = cleaned.slice(7);
    }
    if (cleaned.startsWith('```')) {
        cleaned = cleaned.slice(3);
    }
    if (cleaned.endsWith('```')) {
        cleaned = cleaned.slice(0, -3);
    }
    return cleaned.trim();
}

export function parseJsonContent(content: string): unknown {
    try {
        return JSON.parse(stripCodeFences(content));
    } catch (error: unknown) {
        throw new MalformedResponseError(
            `Completion is not valid JSON: ${error instanceof Error ? error.message : 'parse error'}`,
            content,
            [],
            true,
            { cause: error }
        );
    }
}

/**
 * Parse and validate one candidate evaluation.
 *
 * Shape errors are retryable. A score outside 0-100 is rejected without retry.
 * Fractional scores are rounded and unexpected list lengths are kept, both with
 * a warning.
 */
export function parseEvaluation(content: string, logger: ILogger): Evaluation {
    const parsed = evaluationSchema.safeParse(parseJsonContent(content));
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new MalformedResponseError(
            `Completion does not match the evaluation shape: ${issues.join('; ')}`,
            content,
            issues
        );
    }

    const data = parsed.data;

    if (data.match_score < MIN_SCORE || data.match_score > MAX_SCORE) {
        throw new MalformedResponseError(
            `match_score ${data.match_score} is outside ${MIN_SCORE}-${MAX_SCORE}`,
            content,
            [`match_score: out of range (${data.match_score})`],
            false
        );
    }

    let matchScore = data.match_score;
    if (!Number.isInteger(matchScore)) {
        matchScore = Math.round(matchScore);
        logger.warn({
            candidateName: data.candidate_name,
            received: data.match_score,
            rounded: matchScore
        }, 'Fractional match_score rounded');
    }

    if (data.strengths.length !== REQUESTED_STRENGTHS || data.potential_gaps.length !== REQUESTED_GAPS) {
        logger.warn({
            candidateName: data.candidate_name,
            strengths: data.strengths.length,
            potentialGaps: data.potential_gaps.length,
            expectedStrengths: REQUESTED_STRENGTHS,
            expectedGaps: REQUESTED_GAPS
        }, 'Evaluation list lengths differ from what was requested');
    }

    return Object.freeze({
        candidate_name: data.candidate_name,
        match_score: matchScore,
        rating_summary: data.rating_summary,
        strengths: Object.freeze([...data.strengths]),
        potential_gaps: Object.freeze([...data.potential_gaps])
    });
}

/**
 * Summary completions are plain text; only emptiness is an error.
 */
export function parseSummary(content: string): string {
    const summary = content.trim();
    if (summary.length === 0) {
        throw new MalformedResponseError('Summary completion is empty', content);
    }
    return summary;
}
