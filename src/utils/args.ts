import { UsageError } from '../types/errors';
import { DEFAULT_ASSIGNMENT_NUMBER, DEFAULT_COURSE, type GradingOptions } from '../services/autograder';

export const USAGE = `Usage: pdf-autograder --assignment_pdf <path> --submission_pdf <path> --architect_name <name>
                      [--course <name>] [--assignment_number <n>] [--output_dir <dir>]

Run the multimodal LLM autograder over an assignment and a student submission.`;

const FLAGS = ['assignment_pdf', 'submission_pdf', 'architect_name', 'course', 'assignment_number', 'output_dir'] as const;
type Flag = (typeof FLAGS)[number];

function isFlag(name: string): name is Flag {
    return (FLAGS as readonly string[]).includes(name);
}

export type ParsedArgs = { help: true } | { help: false; options: GradingOptions };

/**
 * Accepts `--flag value` and `--flag=value`. The last occurrence of a flag wins.
 */
export function parseArgs(argv: readonly string[], cwd: string = process.cwd()): ParsedArgs {
    const values = new Map<Flag, string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--help' || arg === '-h') return { help: true };
        if (!arg.startsWith('--')) {
            throw new UsageError(`Unexpected argument: ${arg}`);
        }

        const eq = arg.indexOf('=');
        const name = arg.slice(2, eq === -1 ? undefined : eq);
        if (!isFlag(name)) {
            throw new UsageError(`Unknown option: --${name}`);
        }

        let value: string;
        if (eq !== -1) {
            value = arg.slice(eq + 1);
        } else {
            const next = argv[i + 1];
            if (next === undefined || next.startsWith('--')) {
                throw new UsageError(`Option --${name} expects a value`);
            }
            value = next;
            i++;
        }
        values.set(name, value);
    }

    const required = (flag: Flag): string => {
        const v = values.get(flag);
        if (v === undefined || v.trim() === '') {
            throw new UsageError(`Missing required option: --${flag}`);
        }
        return v;
    };

    return {
        help: false,
        options: {
            assignmentPdf: required('assignment_pdf'),
            submissionPdf: required('submission_pdf'),
            architectName: required('architect_name'),
            course: values.get('course') ?? DEFAULT_COURSE,
            assignmentNumber: values.get('assignment_number') ?? DEFAULT_ASSIGNMENT_NUMBER,
            outputDir: values.get('output_dir') ?? cwd
        }
    };
}
