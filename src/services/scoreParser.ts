import type { ScoreEntry } from '../types/grading';

/*
 * Grammar for the model's evaluation text, applied to each trimmed line:
 *
 *   header := "**" name "**"          sets the pending category (last one wins)
 *   score  := "score:" value ["/" ...]  case-insensitive prefix; value must be an integer
 *
 * A score line only counts while a category is pending, and closes it either way.
 * Malformed values are dropped without a trace. Everything else is ignored.
 */
const HEADER_LINE = /^\*\*(.+)\*\*$/;
const SCORE_LINE = /^score:/i;
const INTEGER = /^[+-]?\d+$/;

export function parseHeader(line: string): string | null {
    const match = HEADER_LINE.exec(line.trim());
    if (!match) return null;
    const name = match[1].trim();
    return name.length > 0 ? name : null;
}

export function parseScoreValue(line: string): number | null {
    const trimmed = line.trim();
    if (!SCORE_LINE.test(trimmed)) return null;
    const rest = trimmed.slice('score:'.length);
    const slash = rest.indexOf('/');
    const value = (slash === -1 ? rest : rest.slice(0, slash)).trim();
    if (!INTEGER.test(value)) return null;
    return Number.parseInt(value, 10);
}

export function parseScores(response: string): ScoreEntry[] {
    const entries: ScoreEntry[] = [];
    let pending: string | null = null;

    for (const line of response.split(/\r?\n/)) {
        const header = parseHeader(line);
        if (header !== null) {
            pending = header;
            continue;
        }
        if (pending === null || !SCORE_LINE.test(line.trim())) continue;

        const score = parseScoreValue(line);
        if (score !== null) entries.push({ category: pending, score });
        pending = null;
    }
    return entries;
}
