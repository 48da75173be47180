/**
 * Code metrics recorded with every version snapshot.
 *
 * These are rough, language-agnostic heuristics. They track the trend across
 * iterations of one run and say nothing absolute about code quality.
 */

export const QUALITY_INITIAL_SCORE = 100;

export interface QualityPenalties {
    longLine: number;
    missingDocstring: number;
    missingComment: number;
    maxLineLength: number;
}

export const DEFAULT_PENALTIES: QualityPenalties = {
    longLine: 0.5,
    missingDocstring: 2.0,
    missingComment: 1.0,
    maxLineLength: 80,
};

export interface CodeMetrics {
    qualityScore: number;
    cyclomaticComplexity: number;
    halsteadVolume: number;
}

export type BugSeverity = 'Major' | 'Minor' | 'Info' | 'Unknown';

export function qualityScore(code: string, penalties: QualityPenalties = DEFAULT_PENALTIES): number {
    let score = QUALITY_INITIAL_SCORE;
    const lines = code.split('\n');

    for (const line of lines) {
        if (line.length > penalties.maxLineLength) score -= penalties.longLine;
    }
    if (lines.length > 1 && !lines[1].trim().startsWith('"""')) {
        score -= penalties.missingDocstring;
    }
    if (!lines.some((line) => line.includes('#') || line.includes('//'))) {
        score -= penalties.missingComment;
    }

    return Math.max(0, Math.min(score, QUALITY_INITIAL_SCORE));
}

function countOccurrences(haystack: string, needle: string): number {
    let count = 0;
    let at = haystack.indexOf(needle);
    while (at !== -1) {
        count++;
        at = haystack.indexOf(needle, at + needle.length);
    }
    return count;
}

/** Branch keywords + 1. */
export function cyclomaticComplexity(code: string): number {
    return countOccurrences(code, 'if ') + countOccurrences(code, 'for ') + countOccurrences(code, 'while ') + 1;
}

export function halsteadVolume(code: string): number {
    return code.length * 2;
}

export function measure(code: string, penalties?: QualityPenalties): CodeMetrics {
    return {
        qualityScore: qualityScore(code, penalties),
        cyclomaticComplexity: cyclomaticComplexity(code),
        halsteadVolume: halsteadVolume(code),
    };
}

export function classifySeverity(report: string): BugSeverity {
    if (report.includes('Severity: Major')) return 'Major';
    if (report.includes('Severity: Minor')) return 'Minor';
    if (report.includes('Severity: Info')) return 'Info';
    return 'Unknown';
}
