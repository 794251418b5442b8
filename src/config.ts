/** candidate identifier. equal to the candidate’s position in the roster */
export type CandidateId = number;

/** either a float or a fraction of two numbers */
export type Rational = number | [number, number];

/** quorum component in election config. an election will only be tabulated if at least <quorum>% voters submit a valid ballot */
export interface ConfigQuorum {
    quorum: Rational;
    quorumInclusive: boolean;
    /** number of voters who could have submitted ballots */
    eligibleVoters: number;
}

/** configuration for an instant-runoff election */
export interface ElectionConfig {
    /** candidate names in roster order. names must be unique */
    candidates: string[];
    quorum?: ConfigQuorum;
}

/** contains information about ballots */
export interface BallotCounts {
    /** number of accepted ballots */
    count: number;
    /** input indices of ballots that were rejected as invalid */
    rejected: number[];
    /** number of voters who could have submitted ballots, if known */
    voters: number | null;
}

/** converts a Rational to a number; resolving any fractions */
function rationalToNumber(r: Rational): number {
    if (Array.isArray(r)) return r[0] / r[1];
    return r;
}

/** returns true if the value is greater than/greater-equal to a threshold given by an (r, inclusive) pair. */
export function passesThreshold(r: Rational, inclusive: boolean, value: Rational): boolean {
    if (inclusive) {
        return rationalToNumber(value) >= rationalToNumber(r);
    }
    return rationalToNumber(value) > rationalToNumber(r);
}

/** returns true if the ballot counts pass the quorum check as specified by the configuration */
export function passesQuorumCheck(config: ConfigQuorum, ballots: BallotCounts): boolean {
    if (config.eligibleVoters <= 0) return false;
    return passesThreshold(config.quorum, config.quorumInclusive, ballots.count / config.eligibleVoters);
}

/** the vote count a candidate must exceed to hold a majority */
export function majorityThreshold(numBallots: number): number {
    return Math.floor(numBallots / 2);
}

/** returns true if `votes` is strictly more than half of `numBallots` */
export function hasMajority(votes: number, numBallots: number): boolean {
    return votes > majorityThreshold(numBallots);
}
