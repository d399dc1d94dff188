import type { EvaluationReport, ImageEvaluation, ScoreSummary } from '../types/grading';
import { completionText } from './modelGateway';

export const SUMMARY_HEADING = '--- SCORE SUMMARY ---';
export const CLOSING_HEADING = '--- CLOSING REMARKS ---';

export function formatEvaluationBlock(evaluation: ImageEvaluation): string {
    return `Page ${evaluation.pageNumber} Image ${evaluation.imageNumber} Evaluation:\n${completionText(evaluation.result)}\n`;
}

export function formatSummaryLines(summary: ScoreSummary): string[] {
    return summary.categories.map(
        (c) => `${c.categoryName}: ${c.average.toFixed(2)}/5 (averaged over ${c.observationCount} images)`
    );
}

export function formatTotalLine(summary: ScoreSummary): string {
    return `TOTAL SCORE: ${summary.finalScore.toFixed(2)}/${summary.maxTotal}`;
}

export function renderReport(report: EvaluationReport): string {
    const blocks = report.evaluations.map(formatEvaluationBlock).join('\n');
    return [
        blocks,
        SUMMARY_HEADING,
        ...formatSummaryLines(report.summary),
        formatTotalLine(report.summary),
        '',
        CLOSING_HEADING,
        completionText(report.closingRemark),
        ''
    ].join('\n');
}
