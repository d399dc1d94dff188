import { access, readFile, rm } from 'fs/promises';
import * as path from 'path';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { Autograder, type GradingOptions } from '../src/services/autograder';
import { ModelGateway } from '../src/services/modelGateway';
import type { CompletionTransport } from '../src/services/transports';
import { DocumentReadError } from '../src/types/errors';
import type { ChatMessage } from '../src/types/grading';
import { BLUE, RED, makeTempDir, writePdf } from './fixtures/pdf';

const FIRST_RESPONSE = '**Clarity**\nJustification: captions are legible.\nScore: 4/5\n\n**Citations**\nJustification: two sources lack APA format.\nScore: 3/5';
const SECOND_RESPONSE = '**Clarity**\nJustification: the plan is blurry.\nScore: 2/5\n\n**Citations**\nJustification: complete.\nScore: 5/5';

function textOf(message: ChatMessage): string {
    return typeof message.content === 'string' ? message.content : '';
}

/**
 * Answers each pipeline step by recognising its prompt.
 */
function scriptedTransport(visionReplies: Array<string | Error>) {
    const queue = [...visionReplies];
    const complete = vi.fn(async (messages: ChatMessage[]): Promise<string> => {
        const first = messages[0];
        if (Array.isArray(first.content)) {
            const reply = queue.shift();
            if (reply === undefined) throw new Error('unexpected vision call');
            if (reply instanceof Error) throw reply;
            return reply;
        }
        const system = textOf(first);
        if (system.startsWith('You will be evaluating')) return 'Common problems: missing citations.';
        if (system.startsWith('Based on the assignment context')) return 'RUBRIC: Clarity 0-5, Citations 0-5';
        if (system.startsWith('You write the closing remarks')) return 'You built a clear narrative; tighten your citations next.';
        throw new Error(`unexpected prompt: ${system.slice(0, 40)}`);
    });
    const transport: CompletionTransport = { name: 'scripted', complete };
    return { transport, complete };
}

describe('Autograder', () => {
    let dir: string;
    let assignmentPdf: string;
    let submissionPdf: string;

    beforeAll(async () => {
        dir = await makeTempDir();
        assignmentPdf = await writePdf(dir, 'assignment.pdf', [{ text: 'Assignment 2: document ten buildings' }]);
        submissionPdf = await writePdf(dir, 'submission.pdf', [
            { text: 'Page one: Villa Savoye', images: [{ width: 640, height: 480, color: RED }] },
            { text: 'Page two: Notre Dame du Haut', images: [{ width: 200, height: 100, color: BLUE }] }
        ]);
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    function options(outputDir: string): GradingOptions {
        return {
            assignmentPdf,
            submissionPdf,
            architectName: 'Le Corbusier',
            course: 'ARCH 160',
            assignmentNumber: '2',
            outputDir
        };
    }

    it('grades every submission image and writes both output files', async () => {
        const { transport, complete } = scriptedTransport([FIRST_RESPONSE, SECOND_RESPONSE]);
        const outputDir = path.join(dir, 'run-ok');
        const outcome = await new Autograder(new ModelGateway(transport)).run(options(outputDir));

        expect(complete).toHaveBeenCalledTimes(5);
        expect(outcome.rubric).toBe('RUBRIC: Clarity 0-5, Citations 0-5');
        expect(await readFile(path.join(outputDir, 'rubric.txt'), 'utf8')).toBe(outcome.rubric);

        expect(outcome.reportText).toBe([
            'Page 1 Image 1 Evaluation:',
            FIRST_RESPONSE,
            '',
            'Page 2 Image 1 Evaluation:',
            SECOND_RESPONSE,
            '',
            '--- SCORE SUMMARY ---',
            'Clarity: 3.00/5 (averaged over 2 images)',
            'Citations: 4.00/5 (averaged over 2 images)',
            'TOTAL SCORE: 7.00/10',
            '',
            '--- CLOSING REMARKS ---',
            'You built a clear narrative; tighten your citations next.',
            ''
        ].join('\n'));
        expect(await readFile(outcome.reportPath, 'utf8')).toBe(outcome.reportText);
        expect(outcome.reportPath).toBe(path.join(outputDir, 'evaluation_result.txt'));
    });

    it('feeds assignment text, rubric and page text into the prompts', async () => {
        const { transport, complete } = scriptedTransport([FIRST_RESPONSE, SECOND_RESPONSE]);
        await new Autograder(new ModelGateway(transport)).run(options(path.join(dir, 'run-prompts')));

        const contextMessages = complete.mock.calls[0][0];
        expect(textOf(contextMessages[0])).toContain('autograder for ARCH 160. Here is instruction for Assignment 2:');
        expect(textOf(contextMessages[0])).toContain('document ten buildings');

        const rubricMessages = complete.mock.calls[1][0];
        expect(rubricMessages[1]).toEqual({ role: 'user', content: 'Common problems: missing citations.' });

        const vision = complete.mock.calls[2][0][0].content;
        expect(Array.isArray(vision)).toBe(true);
        if (!Array.isArray(vision)) return;
        const [textPart, imagePart] = vision;
        expect(textPart.type === 'text' && textPart.text).toContain('Page one: Villa Savoye');
        expect(textPart.type === 'text' && textPart.text).toContain('### RUBRIC\nRUBRIC: Clarity 0-5, Citations 0-5');
        expect(imagePart.type === 'image_url' && imagePart.image_url.url.startsWith('data:image/png;base64,')).toBe(true);
    });

    it('keeps going when a vision call fails', async () => {
        const { transport } = scriptedTransport([new Error('429 rate limited'), SECOND_RESPONSE]);
        const outcome = await new Autograder(new ModelGateway(transport)).run(options(path.join(dir, 'run-degraded')));

        expect(outcome.report.evaluations.map((e) => e.result.ok)).toEqual([false, true]);
        expect(outcome.reportText).toContain('Page 1 Image 1 Evaluation:\n[ERROR: Vision API failed]\n');
        expect(outcome.report.summary).toEqual({
            categories: [
                { categoryName: 'Clarity', average: 2, observationCount: 1 },
                { categoryName: 'Citations', average: 5, observationCount: 1 }
            ],
            finalScore: 7,
            maxTotal: 10
        });
    });

    it('aborts on an unreadable submission without writing a report', async () => {
        const { transport } = scriptedTransport([]);
        const outputDir = path.join(dir, 'run-missing');
        const run = new Autograder(new ModelGateway(transport)).run({
            ...options(outputDir),
            submissionPdf: path.join(dir, 'missing.pdf')
        });

        await expect(run).rejects.toBeInstanceOf(DocumentReadError);
        await expect(access(path.join(outputDir, 'evaluation_result.txt'))).rejects.toThrow();
    });
});
