import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import type { EvaluationReport } from '../types/grading';
import { PDFProcessor, type DocumentExtractor } from '../utils/pdfProcessor';
import { EvaluationAggregator } from './aggregator';
import { completionText, type ModelGateway } from './modelGateway';
import { contextPrompt, evaluationPrompt, rubricPrompt } from './prompts';
import { renderReport } from './report';

export const DEFAULT_COURSE = 'COGS 160, Cognitive/Neuroscience for Architecture';
export const DEFAULT_ASSIGNMENT_NUMBER = 'X';
export const RUBRIC_FILE = 'rubric.txt';
export const REPORT_FILE = 'evaluation_result.txt';

export interface GradingOptions {
    assignmentPdf: string;
    submissionPdf: string;
    architectName: string;
    course: string;
    assignmentNumber: string;
    outputDir: string;
}

export interface GradingOutcome {
    rubric: string;
    report: EvaluationReport;
    reportText: string;
    rubricPath: string;
    reportPath: string;
}

/**
 * Runs the whole grading pipeline, one step and one model call at a time.
 */
export class Autograder {
    constructor(
        private readonly gateway: ModelGateway,
        private readonly extractor: DocumentExtractor = new PDFProcessor()
    ) {}

    async run(options: GradingOptions): Promise<GradingOutcome> {
        const assignmentPages = await this.extractor.extract(options.assignmentPdf);
        const assignmentText = assignmentPages.map((page) => page.text).join('\n');

        console.log('[Autograder] Setting up assignment context...');
        const context = await this.gateway.completeChat([
            { role: 'system', content: contextPrompt(options.course, options.assignmentNumber, assignmentText) }
        ]);

        console.log('[Autograder] Generating rubric...');
        const { system, user } = rubricPrompt(completionText(context));
        const rubric = completionText(await this.gateway.completeChat([
            { role: 'system', content: system },
            { role: 'user', content: user }
        ]));

        await mkdir(options.outputDir, { recursive: true });
        const rubricPath = path.join(options.outputDir, RUBRIC_FILE);
        await writeFile(rubricPath, rubric, 'utf8');

        const submissionPages = await this.extractor.extract(options.submissionPdf);
        const aggregator = new EvaluationAggregator();

        console.log('[Autograder] Evaluating pages with associated images and text...');
        for (const page of submissionPages) {
            for (let i = 0; i < page.images.length; i++) {
                console.log(`[Autograder]   Page ${page.pageNumber}, Image ${i + 1}`);
                const prompt = evaluationPrompt(rubric, page.text, options.architectName);
                const result = await this.gateway.completeVision(prompt, page.images[i]);
                aggregator.add({ pageNumber: page.pageNumber, imageNumber: i + 1, result });
            }
        }

        const report = await aggregator.finalize(this.gateway, options.architectName);
        const reportText = renderReport(report);
        const reportPath = path.join(options.outputDir, REPORT_FILE);
        await writeFile(reportPath, reportText, 'utf8');

        return { rubric, report, reportText, rubricPath, reportPath };
    }
}
