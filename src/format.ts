import { ElectionOutcome, ElectionStatus } from './config-election';

/** renders an outcome as a one-line message */
export function formatOutcome(outcome: ElectionOutcome<string>): string {
    if (outcome.status === ElectionStatus.Winner) {
        return `Winner is ${outcome.winner}`;
    } else if (outcome.status === ElectionStatus.Tie) {
        return `Tie between ${outcome.tiedCandidates.join(', ')}`;
    }
    return `No quorum (${outcome.ballots.count} of ${outcome.ballots.voters} eligible voters cast a ballot)`;
}
