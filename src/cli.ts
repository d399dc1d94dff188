import dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from './config';
import { Autograder } from './services/autograder';
import { ModelGateway } from './services/modelGateway';
import { createTransport } from './services/transports';
import { UsageError } from './types/errors';
import { USAGE, parseArgs } from './utils/args';

/**
 * Runs the autograder for one command line and resolves to the process exit code:
 * 0 on success, 2 on a usage error, 1 on any other failure.
 */
export async function main(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
    try {
        const parsed = parseArgs(argv);
        if (parsed.help) {
            console.log(USAGE);
            return 0;
        }

        const config = loadConfig(env);
        console.log(`[STARTUP] Provider: ${config.provider}, model: ${config.model}`);
        const gateway = new ModelGateway(createTransport(config));
        const grader = new Autograder(gateway);
        console.log('[STARTUP] Autograder initialized');

        const outcome = await grader.run(parsed.options);

        console.log('\n--- Final Combined Evaluation ---');
        console.log('\n--- RUBRIC ---\n');
        console.log(outcome.rubric);
        console.log('\n--- PER-PAGE IMAGE + TEXT EVALUATIONS ---\n');
        console.log(outcome.reportText);
        console.log(`[Autograder] Rubric saved to ${outcome.rubricPath}`);
        console.log(`[Autograder] Evaluation saved to ${outcome.reportPath}`);
        return 0;
    } catch (error) {
        if (error instanceof UsageError) {
            console.error(`${error.message}\n\n${USAGE}`);
            return 2;
        }
        console.error('[FATAL]', error);
        return 1;
    }
}

const entry = process.argv[1];
if (entry && fileURLToPath(import.meta.url) === path.resolve(entry)) {
    dotenv.config({ path: '.env.local' });
    dotenv.config();
    void main(process.argv.slice(2)).then((code) => {
        process.exitCode = code;
    });
}
