import { BallotFileError } from './errors';

/** contents of a parsed ballot file */
export interface BallotFile {
    candidates: string[];
    /** rank arrays in file order */
    ballots: number[][];
    /** 1-based line number of each ballot */
    lines: number[];
}

/**
 * Parses a ballot file.
 *
 * # Format
 * Blank lines and lines starting with `#` are ignored. The first remaining line lists the candidate names,
 * separated by commas. Every line after that is one ballot: the rank of each candidate, in roster order,
 * separated by commas.
 *
 * ```text
 * # board election
 * Ada, Grace, Linus
 * 1, 2, 3
 * 3, 1, 2
 * ```
 *
 * Ballots are only checked for being integers; whether they are valid rankings is up to the election.
 */
export function parseBallotFile(text: string): BallotFile {
    let candidates: string[] | null = null;
    const ballots: number[][] = [];
    const lines: number[] = [];

    const rawLines = text.split(/\r?\n/);
    for (let i = 0; i < rawLines.length; i++) {
        const line = rawLines[i].trim();
        const lineNumber = i + 1;
        if (!line || line.startsWith('#')) continue;

        const fields = line.split(',').map(field => field.trim());
        if (!candidates) {
            if (fields.some(name => !name)) {
                throw new BallotFileError('candidate names cannot be empty', lineNumber);
            }
            candidates = fields;
            continue;
        }

        const ranks = fields.map(field => {
            if (!/^[+-]?\d+$/.test(field)) {
                throw new BallotFileError(`expected an integer rank, got “${field}”`, lineNumber);
            }
            return Number.parseInt(field, 10);
        });
        ballots.push(ranks);
        lines.push(lineNumber);
    }

    if (!candidates) {
        throw new BallotFileError('missing candidate list', 1);
    }
    return { candidates, ballots, lines };
}
