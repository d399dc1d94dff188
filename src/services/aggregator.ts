import type {
    CategoryTally,
    EvaluationReport,
    ImageEvaluation,
    ScoreSummary
} from '../types/grading';
import type { ModelGateway } from './modelGateway';
import { closingPrompt } from './prompts';
import { formatSummaryLines } from './report';
import { parseScores } from './scoreParser';

export const POINTS_PER_CATEGORY = 5;

/**
 * Folds per-image model responses into per-category tallies. Categories are
 * keyed by their exact (trimmed) name, so wording drift between images yields
 * separate categories.
 */
export class EvaluationAggregator {
    private readonly evaluations: ImageEvaluation[] = [];
    private readonly tallies = new Map<string, CategoryTally>();

    add(evaluation: ImageEvaluation): void {
        this.evaluations.push(evaluation);
        if (!evaluation.result.ok) return;

        for (const { category, score } of parseScores(evaluation.result.text)) {
            const tally = this.tallies.get(category);
            if (tally) {
                tally.scoreSum += score;
                tally.observationCount += 1;
            } else {
                this.tallies.set(category, { categoryName: category, scoreSum: score, observationCount: 1 });
            }
        }
    }

    getEvaluations(): ImageEvaluation[] {
        return [...this.evaluations];
    }

    getTallies(): CategoryTally[] {
        return [...this.tallies.values()].map((tally) => ({ ...tally }));
    }

    summarize(): ScoreSummary {
        const categories = [...this.tallies.values()]
            .filter((tally) => tally.observationCount > 0)
            .map((tally) => ({
                categoryName: tally.categoryName,
                average: tally.scoreSum / tally.observationCount,
                observationCount: tally.observationCount
            }));

        return {
            categories,
            finalScore: categories.reduce((sum, c) => sum + c.average, 0),
            maxTotal: POINTS_PER_CATEGORY * categories.length
        };
    }

    /**
     * Computes the summary and asks the model for the closing paragraph.
     */
    async finalize(gateway: ModelGateway, architectName: string): Promise<EvaluationReport> {
        const summary = this.summarize();
        const closingRemark = await gateway.completeChat(closingPrompt(formatSummaryLines(summary), architectName));
        return { evaluations: this.getEvaluations(), summary, closingRemark };
    }
}
