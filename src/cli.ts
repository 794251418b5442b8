#!/usr/bin/env node

/**
 * Ranked choice CLI
 * Tabulates a ballot file and prints the winner
 */

import * as fs from 'fs';
import { parseBallotFile } from './ballot-file';
import { runConfigElection } from './config-election';
import { formatOutcome } from './format';

function showHelp() {
    console.log(`Usage: ranked-choice <ballot-file>

The first line of the file lists the candidates, separated by commas.
Every following line is one ballot: the rank of each candidate, in the same order.`);
}

export function main(args: string[]): number {
    const file = args[0];
    if (!file || file === '--help' || file === '-h') {
        showHelp();
        return file ? 0 : 1;
    }

    try {
        const { candidates, ballots, lines } = parseBallotFile(fs.readFileSync(file, 'utf8'));
        const outcome = runConfigElection({ candidates }, ballots);

        if (outcome.ballots.rejected.length) {
            const rejectedLines = outcome.ballots.rejected.map(index => lines[index]);
            console.error(`Rejected ${rejectedLines.length} invalid ballot(s) on line(s) ${rejectedLines.join(', ')}`);
        }
        console.log(formatOutcome(outcome));
        return 0;
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        return 1;
    }
}

if (require.main === module) {
    process.exitCode = main(process.argv.slice(2));
}
