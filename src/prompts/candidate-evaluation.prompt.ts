import type { JobSpec } from '../types/evaluation';

export const EVALUATION_SYSTEM_PROMPT = 'You are an expert HR analyst. You always respond with valid JSON only.';

export interface ScoringCategory {
    readonly label: string;
    readonly points: number;
    readonly description: string;
}

export const SCORING_CATEGORIES: readonly ScoringCategory[] = [
    { label: 'Core Skills Match', points: 35, description: 'How well technical/functional skills align with role' },
    { label: 'Experience Relevance', points: 25, description: 'Relevance of past work to this position' },
    { label: 'Experience Level', points: 15, description: 'Years of experience and seniority level' },
    { label: 'Education and Certifications', points: 5, description: 'Academic background and professional certifications' },
    { label: 'Soft Skills and Competencies', points: 10, description: 'Leadership, communication, problem-solving' },
    { label: 'Bonus Fit Indicators', points: 10, description: 'Cultural fit, additional value-adds, achievements' }
];

export const REQUESTED_STRENGTHS = 4;
export const REQUESTED_GAPS = 2;
export const RATING_SUMMARY_WORDS = 50;

function jobDetailLines(job: JobSpec): string {
    const lines = [
        `- Role: ${job.title}`,
        `- Company: ${job.company}`,
        `- Department: ${job.department}`
    ];
    if (job.location) {
        lines.push(`- Location: ${job.location}`);
    }
    if (job.work_mode) {
        lines.push(`- Work Mode: ${job.work_mode}`);
    }
    if (job.job_description) {
        lines.push(`- Job Description: ${job.job_description}`);
    }
    return lines.join('\n');
}

/**
 * Per-candidate scoring prompt. Pure: the same inputs always give the same text.
 */
export function buildEvaluationPrompt(cvText: string, candidateName: string, job: JobSpec): string {
    const total = SCORING_CATEGORIES.reduce((sum, category) => sum + category.points, 0);
    const scoring = SCORING_CATEGORIES
        .map(category => `- ${category.label}: ${category.points} points (${category.description})`)
        .join('\n');
    const strengths = Array.from({ length: REQUESTED_STRENGTHS }, (_, i) => `    "<strength ${i + 1}>"`).join(',\n');
    const gaps = Array.from({ length: REQUESTED_GAPS }, (_, i) => `    "<gap ${i + 1}>"`).join(',\n');

    return `You are an expert HR analyst evaluating candidate CVs for a specific role.

**JOB DETAILS:**
${jobDetailLines(job)}

**CANDIDATE CV:**
${cvText}

**YOUR TASK:**
Evaluate this candidate against the role requirements and provide a structured assessment.

**SCORING SYSTEM (Total: ${total} points):**
${scoring}

**IMPORTANT:** Be lenient in scoring. Most qualified candidates should score 65-85. Only truly exceptional candidates score 90+. Only severely mismatched candidates score below 50.

**OUTPUT FORMAT (You MUST respond with valid JSON only):**
{
  "candidate_name": ${JSON.stringify(candidateName)},
  "match_score": <integer 0-100>,
  "rating_summary": "<exactly ${RATING_SUMMARY_WORDS} words>",
  "strengths": [
${strengths}
  ],
  "potential_gaps": [
${gaps}
  ]
}

**RULES:**
1. Respond ONLY with valid JSON. No markdown, no explanations, just JSON.
2. Use exactly these keys: candidate_name, match_score, rating_summary, strengths, potential_gaps.
3. Rating summary must be EXACTLY ${RATING_SUMMARY_WORDS} words (±3 words acceptable) explaining the scoring logic.
4. Provide exactly ${REQUESTED_STRENGTHS} strengths and ${REQUESTED_GAPS} potential gaps.
5. Be specific and reference actual experience from the CV.
6. Be lenient - focus on potential and transferable skills.
7. Match score should reflect overall evaluation across all criteria.
`;
}
