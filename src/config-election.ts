import { preferencesToRanks } from './ballots';
import { BallotCounts, CandidateId, ElectionConfig, passesQuorumCheck } from './config';
import { Election, IrvEvent, IrvStatus, remapIrvEvent } from './election';
import { ElectionError, ErrorCodes, InvalidBallotError } from './errors';

/** Possible election outcomes. */
export enum ElectionStatus {
    /** One candidate won */
    Winner = 'winner',
    /** The remaining candidates are tied */
    Tie = 'tie',
    /** Too few eligible voters submitted a valid ballot */
    NoQuorum = 'no-quorum',
}

/**
 * an election outcome. union of all possible outcome statuses.
 */
export type ElectionOutcome<N> = {
    status: ElectionStatus.Winner;
    ballots: BallotCounts;
    winner: N;
    events: IrvEvent<N>[];
} | {
    status: ElectionStatus.Tie;
    ballots: BallotCounts;
    tiedCandidates: N[];
    events: IrvEvent<N>[];
} | {
    status: ElectionStatus.NoQuorum;
    ballots: BallotCounts;
};

/** remaps an election outcome from one candidate type to another with a remapping function. */
export function remapOutcome<N, M>(outcome: ElectionOutcome<N>, remap: (node: N) => M): ElectionOutcome<M> {
    if (outcome.status === ElectionStatus.Winner) {
        return {
            ...outcome,
            winner: remap(outcome.winner),
            events: outcome.events.map(event => remapIrvEvent(event, remap)),
        };
    } else if (outcome.status === ElectionStatus.Tie) {
        return {
            ...outcome,
            tiedCandidates: outcome.tiedCandidates.map(remap),
            events: outcome.events.map(event => remapIrvEvent(event, remap)),
        };
    }
    // contains no candidates
    return outcome;
}

/** builds, fills and tabulates an election. candidates in the outcome are roster ids */
function runRosterElection(
    names: readonly string[],
    ballots: readonly (readonly number[])[],
    quorum: ElectionConfig['quorum'],
): ElectionOutcome<CandidateId> {
    const election = new Election(names.length);
    for (const name of names) election.addCandidate(name);

    const rejected: number[] = [];
    ballots.forEach((ranks, index) => {
        try {
            election.addBallot(ranks);
        } catch (err) {
            if (!(err instanceof InvalidBallotError)) throw err;
            rejected.push(index);
        }
    });

    const ballotCounts: BallotCounts = {
        count: ballots.length - rejected.length,
        rejected,
        voters: quorum ? quorum.eligibleVoters : null,
    };

    if (quorum && !passesQuorumCheck(quorum, ballotCounts)) {
        return {
            status: ElectionStatus.NoQuorum,
            ballots: ballotCounts,
        };
    }

    const result = election.tabulate();
    if (result.status === IrvStatus.Winner) {
        return { status: ElectionStatus.Winner, ballots: ballotCounts, winner: result.winner, events: result.events };
    }
    return { status: ElectionStatus.Tie, ballots: ballotCounts, tiedCandidates: result.tiedCandidates, events: result.events };
}

/**
 * Runs an election according to the configuration, with candidates identified by name.
 *
 * Parameters:
 *
 * - `config`: an election configuration. see type definition for further details
 * - `ballots`: rank arrays, each indexed by the candidate’s position in `config.candidates`.
 *   ballots that are not a permutation of 1..n are skipped and listed by index in `ballots.rejected`
 */
export function runConfigElection(config: ElectionConfig, ballots: readonly (readonly number[])[]): ElectionOutcome<string> {
    const outcome = runRosterElection(config.candidates, ballots, config.quorum);
    return remapOutcome(outcome, id => config.candidates[id]);
}

/**
 * Runs an election according to the configuration, with arbitrary candidate values.
 *
 * Additional notes:
 *
 * - candidate values must be `===`-comparable and distinct.
 * - `config.candidates` is ignored in favor of the `candidates` parameter.
 *
 * Parameters:
 *
 * - `config`: an election configuration
 * - `preferences`: all ballots, each listing candidates from most to least preferred.
 *   a ballot must list every candidate exactly once; any other ballot is rejected.
 * - `candidates`: list of candidates in roster order
 */
export function runMappedConfigElection<N>(
    config: ElectionConfig,
    preferences: readonly (readonly N[])[],
    candidates: readonly N[],
): ElectionOutcome<N> {
    candidates.forEach((cand, index) => {
        if (candidates.indexOf(cand) !== index) {
            throw new ElectionError(`Candidate ${String(cand)} is listed more than once`, ErrorCodes.DUPLICATE_CANDIDATE);
        }
    });

    // an unconvertible ballot still has to be rejected by index, so it is passed on as an empty ranking
    const ballots = preferences.map(order => preferencesToRanks(order, candidates) || []);

    // candidate values need not have distinct string forms, so the roster is named by position
    const names = candidates.map((_, index) => String(index));
    const outcome = runRosterElection(names, ballots, config.quorum);
    return remapOutcome(outcome, id => candidates[id]);
}
