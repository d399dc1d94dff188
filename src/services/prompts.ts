import type { ChatMessage } from '../types/grading';

export const PAGE_TEXT_LIMIT = 1000;

export function contextPrompt(course: string, assignmentNumber: string, assignmentText: string): string {
    return `You will be evaluating student submission as an autograder for ${course}. ` +
        `Here is instruction for Assignment ${assignmentNumber}:\n${assignmentText}\n` +
        'Please answer the following in order:\n' +
        '1. What common problem do you envision among student submissions?\n' +
        '2. What common problem could be minimized?\n' +
        '3. What are the essential advice, FAQs for students to better understand for this assignment?\n' +
        '4. Visual reasoning is required for grading images, what are you looking for for good quality images?\n' +
        '   * High resolution\n' +
        '   * Spatial clarity\n' +
        '   * Clear perspective\n' +
        '   * Understandable shapes\n' +
        '   * Not visually confusing\n' +
        '5. How are you going to break each part based on quantitative and qualitative evaluation?';
}

export function rubricPrompt(contextSummary: string): { system: string; user: string } {
    return {
        system: 'Based on the assignment context and the issues identified, produce a detailed rubric ' +
            'with clear criteria and scoring guidelines out of 5 points for each category.',
        user: contextSummary
    };
}

/**
 * Per-image grading instructions. The `**[Category Name]**` / `Score: x/5` block at the end
 * is what scoreParser reads back; keep the two in step.
 */
export function evaluationPrompt(rubric: string, pageText: string, architectName: string): string {
    return `
Now, you will begin to evaluate a student's architecture assignment on the architect ${architectName}.

This is a formal submission for university credit. You are receiving the full document as **images**, so you can directly observe the formatting, embedded images, captions, structure, and layout.
---
###  How to Grade:
Your role is to critically assess this university-level submission with academic rigor. These assignments are not informal design exercises. They are formal evaluations that contribute to course credit. The student will receive and revise based on your feedback, so your comments must be clear, constructive, and directly tied to the rubric.
Be Fair and Constructive
    - Acknowledge when a student does something well, but avoid vague praise like "good job". Always explain why it works.
    - If something falls short (poor layout, unclear citations, missing sections), call it out. Use phrases like "needs revision" or "this should be improved by..." followed by specific, actionable advice.
Do Not Sugarcoat
    - Don't assume good intentions compensate for missing elements. Every section is held to the same professional and academic standard.
    - If key parts (e.g., APA citations, required image counts, biographical detail) are missing or flawed, say so plainly and reduce the score accordingly.
When Something is Strong, note It
    - If an image citation is consistent across the document, or if the architectural description is especially well-written, say so.
    - Strong layout and professionalism should be highlighted. This helps students understand what to keep and build on.
Prioritize These Elements Above All
    1. Accuracy of Academic Citations
    2. Caption and Image Attribution Clarity
    3. Clear Distinction Between Interior vs Exterior Images
    4. Overall Layout and Visual Professionalism
---
###  Additional Clarifications:
-  Images are embedded (not just links)
-  Captions below images include attribution (URLs or photographer names)
-  A student photo and bio appear on Page 2
-  Table of Contents is present
-  10 buildings are described
-  Redundant links are likely citations, not missing content
-  If you see an unrelevant image on the very first few pages, it may be an image of the student themselves. Do not grade that image.
---
Now consider the following context from the student document:
### Nearby Text:
${pageText.slice(0, PAGE_TEXT_LIMIT)}
---
### RUBRIC
${rubric}
Please assess the submission. For every category:
1. Give a **detailed justification** (1-2 paragraphs)
2. Assign a score **out of 5** based on the detailed rubric below
Format:
**[Category Name]**
Justification: ...
Score: x/5
Start your rubric-based evaluation below:
`;
}

export function closingPrompt(summaryLines: readonly string[], architectName: string): ChatMessage[] {
    const summary = summaryLines.length > 0 ? summaryLines.join('\n') : '(no category scores were recorded)';
    return [
        {
            role: 'system',
            content: 'You write the closing remarks of a graded university assignment. ' +
                'Write one short paragraph (3-5 sentences) addressed directly to the student in the second person. ' +
                'Be honest and encouraging, name the strongest area and the most important thing to revise, ' +
                'and comment only on the work itself, never on the student\'s appearance or person.'
        },
        {
            role: 'user',
            content: `The assignment studied the architect ${architectName}. Final category averages:\n${summary}`
        }
    ];
}
