import { CandidateId } from './config';
import { ElectionError, ErrorCodes } from './errors';

/**
 * Returns true if the ranking is exactly `candidateCount` long and contains a permutation of the numbers
 * 1 to `candidateCount`.
 *
 * Rankings are indexed by candidate: `ranks[id]` is the position the voter gave candidate `id`, 1 being the top
 * choice. `[2, 1, 3]` thus ranks candidate 1 first, candidate 0 second and candidate 2 third.
 */
export function isBallotValid(ranks: readonly number[], candidateCount: number): boolean {
    if (ranks.length !== candidateCount) return false;

    const sortedRanks = ranks.slice().sort((a, b) => a - b);
    for (let i = 0; i < sortedRanks.length; i++) {
        if (sortedRanks[i] !== i + 1) return false;
    }
    return true;
}

/**
 * One voter’s complete ranking.
 *
 * The ranking itself never changes. What changes is which candidates are no longer eligible to be this ballot’s
 * top choice.
 */
export class Ballot {
    readonly ranks: readonly number[];
    #eliminated: boolean[];

    /**
     * Creates a new ballot. The ranking must already have passed `isBallotValid`; it is not checked here.
     */
    constructor(ranks: readonly number[]) {
        this.ranks = ranks.slice();
        this.#eliminated = ranks.map(() => false);
    }

    /** returns the eligible candidate with the lowest rank value */
    getTopCandidate(): CandidateId {
        let top: CandidateId | null = null;
        for (let cand = 0; cand < this.ranks.length; cand++) {
            if (this.#eliminated[cand]) continue;
            if (top === null || this.ranks[cand] < this.ranks[top]) top = cand;
        }

        if (top === null) {
            throw new ElectionError('Ballot has no remaining eligible candidates', ErrorCodes.NO_REMAINING_CHOICE);
        }
        return top;
    }

    /** marks a candidate as no longer eligible on this ballot. repeated calls have no further effect */
    eliminateCandidate(candidate: CandidateId) {
        if (candidate < 0 || candidate >= this.ranks.length) {
            throw new ElectionError(`Candidate ${candidate} is not on this ballot`, ErrorCodes.UNKNOWN_CANDIDATE);
        }
        this.#eliminated[candidate] = true;
    }
}

/**
 * Converts a preference order (most preferred first) into a rank array indexed by candidate.
 *
 * Returns null if the order mentions a candidate that is not in the roster or mentions one twice. Candidates the
 * order leaves out get rank 0, which `isBallotValid` rejects.
 */
export function preferencesToRanks<N>(preferences: readonly N[], candidates: readonly N[]): number[] | null {
    const ranks = candidates.map(() => 0);
    for (let i = 0; i < preferences.length; i++) {
        const index = candidates.indexOf(preferences[i]);
        if (index === -1 || ranks[index] !== 0) return null;
        ranks[index] = i + 1;
    }
    return ranks;
}
