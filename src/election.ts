import { Ballot, isBallotValid } from './ballots';
import { Candidate } from './candidate';
import { CandidateId, hasMajority, majorityThreshold } from './config';
import {
    CandidateOverflowError,
    ElectionError,
    ErrorCodes,
    InvalidBallotError,
    InvariantViolationError,
} from './errors';

export enum IrvStatus {
    /** a single candidate won, either by majority or as the last one remaining */
    Winner = 'winner',
    /** all remaining candidates hold the same number of votes */
    Tie = 'tie',
}

export enum IrvEventType {
    /** a candidate holds strictly more than half of all ballots */
    ElectMajority = 'elect-majority',
    /** a candidate was elected because everyone else was eliminated */
    ElectLastRemaining = 'elect-last-remaining',
    /** the remaining candidates are tied */
    Tie = 'tie',
    /** a candidate was eliminated and its ballots were redistributed */
    Eliminate = 'eliminate',
}

/** `values` always holds the vote count of each candidate still in contention at that point */
export type IrvEvent<N> = {
    type: IrvEventType.ElectMajority,
    elected: N,
    values: Map<N, number>,
    threshold: number,
} | {
    type: IrvEventType.ElectLastRemaining,
    elected: N,
    values: Map<N, number>,
} | {
    type: IrvEventType.Tie,
    tied: N[],
    values: Map<N, number>,
} | {
    type: IrvEventType.Eliminate,
    candidate: N,
    values: Map<N, number>,
    /** how many of the eliminated candidate’s ballots went to each other candidate */
    transfers: Map<N, number>,
};

export type IrvResult<N> = {
    status: IrvStatus.Winner;
    winner: N;
    events: IrvEvent<N>[];
} | {
    status: IrvStatus.Tie;
    tiedCandidates: N[];
    events: IrvEvent<N>[];
};

function remapValues<N, M>(values: Map<N, number>, remap: (node: N) => M): Map<M, number> {
    return new Map([...values.entries()].map(([k, v]) => [remap(k), v]));
}

// for converting from one candidate type to another
export function remapIrvEvent<N, M>(event: IrvEvent<N>, remap: (node: N) => M): IrvEvent<M> {
    const values = remapValues(event.values, remap);
    if (event.type === IrvEventType.ElectMajority) {
        return { ...event, elected: remap(event.elected), values };
    } else if (event.type === IrvEventType.ElectLastRemaining) {
        return { ...event, elected: remap(event.elected), values };
    } else if (event.type === IrvEventType.Tie) {
        return { ...event, tied: event.tied.map(remap), values };
    }
    return { ...event, candidate: remap(event.candidate), values, transfers: remapValues(event.transfers, remap) };
}

export function remapIrvResult<N, M>(result: IrvResult<N>, remap: (node: N) => M): IrvResult<M> {
    const events = result.events.map(event => remapIrvEvent(event, remap));
    if (result.status === IrvStatus.Winner) {
        return { status: result.status, winner: remap(result.winner), events };
    }
    return { status: result.status, tiedCandidates: result.tiedCandidates.map(remap), events };
}

/** read-only view of a candidate in an election */
export interface CandidateView {
    readonly id: CandidateId;
    getName(): string;
    getVotes(): number;
    isEliminated(): boolean;
}

function viewOf(candidate: Candidate): CandidateView {
    return Object.freeze({
        id: candidate.id,
        getName: () => candidate.getName(),
        getVotes: () => candidate.getVotes(),
        isEliminated: () => candidate.isEliminated(),
    });
}

function assertAnyRemaining(remaining: readonly CandidateView[]) {
    if (!remaining.length) {
        throw new ElectionError('No candidates remain in contention', ErrorCodes.NO_REMAINING_CHOICE);
    }
}

/**
 * returns the id of the remaining candidate with the fewest votes.
 * the search is seeded from the first remaining candidate, so on equal votes the lowest id wins.
 */
export function findFewestVotes(remaining: readonly CandidateView[], tally: readonly number[]): CandidateId {
    assertAnyRemaining(remaining);
    let fewest = remaining[0].id;
    for (const cand of remaining) {
        if (tally[cand.id] < tally[fewest]) fewest = cand.id;
    }
    return fewest;
}

/** returns the id of the remaining candidate with the most votes, seeded the same way as `findFewestVotes` */
export function findMostVotes(remaining: readonly CandidateView[], tally: readonly number[]): CandidateId {
    assertAnyRemaining(remaining);
    let most = remaining[0].id;
    for (const cand of remaining) {
        if (tally[cand.id] > tally[most]) most = cand.id;
    }
    return most;
}

/**
 * checks that the tally matches the ballots each candidate holds, and that the remaining candidates together
 * hold every ballot.
 */
export function assertBallotCount(candidates: readonly CandidateView[], tally: readonly number[], numBallots: number) {
    let total = 0;
    for (const cand of candidates) {
        if (tally[cand.id] !== cand.getVotes()) {
            throw new InvariantViolationError(
                `Tally for ${cand.getName()} is ${tally[cand.id]} but it holds ${cand.getVotes()} ballot(s)`,
            );
        }
        if (!cand.isEliminated()) total += tally[cand.id];
    }
    if (total !== numBallots) {
        throw new InvariantViolationError(`Expected ${numBallots} ballot(s) in contention, found ${total}`);
    }
}

/**
 * An instant-runoff election over a fixed roster of candidates.
 *
 * Usage: add exactly `numCandidates` candidates, then any number of ballots, then call `selectWinner` (or
 * `tabulate` for the round-by-round events). Candidate ids are assigned in the order candidates are added, and
 * that order also decides who is eliminated first on equal votes and how tied candidates are listed.
 */
export class Election {
    readonly capacity: number;
    #candidates: Candidate[] = [];
    #views: CandidateView[] = [];
    /** votes per candidate id during tabulation. mirrors each candidate’s held ballots */
    #tally: number[] = [];
    #result: IrvResult<CandidateId> | null = null;

    constructor(numCandidates: number) {
        if (!Number.isInteger(numCandidates) || numCandidates < 1) {
            throw new RangeError(`An election needs a positive whole number of candidates, got ${numCandidates}`);
        }
        this.capacity = numCandidates;
    }

    /** adds the next candidate to the roster and returns its id */
    addCandidate(name: string): CandidateId {
        if (this.#candidates.length >= this.capacity) {
            throw new CandidateOverflowError(this.capacity);
        }
        if (this.#candidates.some(cand => cand.getName() === name)) {
            throw new ElectionError(`Candidate ${name} is already in the roster`, ErrorCodes.DUPLICATE_CANDIDATE);
        }

        const id = this.#candidates.length;
        const candidate = new Candidate(id, name);
        this.#candidates.push(candidate);
        this.#views.push(viewOf(candidate));
        return id;
    }

    /** returns read-only views of the roster in id order */
    getCandidates(): readonly CandidateView[] {
        return this.#views.slice();
    }

    /** whether all `capacity` candidates have been added */
    isRosterComplete(): boolean {
        return this.#candidates.length === this.capacity;
    }

    /**
     * Adds a completed ballot. `ranks[id]` is the rank the voter gave candidate `id`, and the ranks must be a
     * permutation of 1 to the number of candidates.
     *
     * Throws an `InvalidBallotError` without changing anything if the ballot is not valid.
     */
    addBallot(ranks: readonly number[]) {
        if (this.#result) {
            throw new ElectionError('Ballots cannot be added after the election was tabulated', ErrorCodes.ELECTION_CLOSED);
        }
        this.#assertRosterComplete();
        if (!isBallotValid(ranks, this.capacity)) {
            throw new InvalidBallotError(ranks, this.capacity);
        }

        const ballot = new Ballot(ranks);
        this.#candidates[ballot.getTopCandidate()].addBallot(ballot);
    }

    /**
     * Applies the ranked choice voting algorithm and returns the names of the winners: a single name if there is
     * a winner, or the names of all tied candidates in roster order.
     */
    selectWinner(): string[] {
        const result = remapIrvResult(this.tabulate(), id => this.#candidates[id].getName());
        if (result.status === IrvStatus.Winner) return [result.winner];
        return result.tiedCandidates;
    }

    /**
     * Runs the elimination rounds and returns the result along with every event along the way.
     *
     * Tabulation happens once; later calls return the same result.
     */
    tabulate(): IrvResult<CandidateId> {
        if (this.#result) return this.#result;
        this.#assertRosterComplete();

        this.#tally = this.#candidates.map(cand => cand.getVotes());
        // ballots only ever move between candidates, so this stays fixed
        const numBallots = this.#tally.reduce((a, b) => a + b, 0);
        const events: IrvEvent<CandidateId>[] = [];

        while (true) {
            for (const cand of this.#remaining()) {
                if (hasMajority(this.#tally[cand.id], numBallots)) {
                    events.push({
                        type: IrvEventType.ElectMajority,
                        elected: cand.id,
                        values: this.#currentValues(),
                        threshold: majorityThreshold(numBallots),
                    });
                    return this.#finish({ status: IrvStatus.Winner, winner: cand.id, events });
                }
            }

            const remaining = this.#remaining();
            const maxVotes = this.#tally[findMostVotes(remaining, this.#tally)];
            const tied = remaining.length > 1 && remaining.every(cand => this.#tally[cand.id] === maxVotes);

            if (tied) {
                const tiedCandidates = remaining.map(cand => cand.id);
                events.push({ type: IrvEventType.Tie, tied: tiedCandidates, values: this.#currentValues() });
                return this.#finish({ status: IrvStatus.Tie, tiedCandidates, events });
            } else if (remaining.length === 1) {
                const winner = remaining[0].id;
                events.push({ type: IrvEventType.ElectLastRemaining, elected: winner, values: this.#currentValues() });
                return this.#finish({ status: IrvStatus.Winner, winner, events });
            }

            const candidateToEliminate = this.#candidates[findFewestVotes(remaining, this.#tally)];
            const transfers = this.#eliminate(candidateToEliminate);
            assertBallotCount(this.#candidates, this.#tally, numBallots);
            events.push({
                type: IrvEventType.Eliminate,
                candidate: candidateToEliminate.id,
                values: this.#currentValues(),
                transfers,
            });
        }
    }

    #assertRosterComplete() {
        if (!this.isRosterComplete()) {
            throw new ElectionError(
                `Election expects ${this.capacity} candidate(s) but only ${this.#candidates.length} were added`,
                ErrorCodes.ROSTER_INCOMPLETE,
            );
        }
    }

    #finish(result: IrvResult<CandidateId>): IrvResult<CandidateId> {
        this.#result = result;
        return result;
    }

    #remaining(): Candidate[] {
        return this.#candidates.filter(cand => !cand.isEliminated());
    }

    #currentValues(): Map<CandidateId, number> {
        return new Map(this.#remaining().map(cand => [cand.id, this.#tally[cand.id]]));
    }

    /**
     * eliminates a candidate and gives each of its ballots to that ballot’s next eligible choice.
     * returns how many ballots each candidate received.
     */
    #eliminate(candidate: Candidate): Map<CandidateId, number> {
        const ballots = candidate.eliminate();
        this.#tally[candidate.id] = 0;

        const transfers = new Map<CandidateId, number>();
        for (const ballot of ballots) {
            ballot.eliminateCandidate(candidate.id);

            // the ballot may rank candidates that were eliminated while someone else held it
            let next = ballot.getTopCandidate();
            while (this.#candidates[next].isEliminated()) {
                ballot.eliminateCandidate(next);
                next = ballot.getTopCandidate();
            }

            this.#candidates[next].addBallot(ballot);
            this.#tally[next]++;
            transfers.set(next, (transfers.get(next) || 0) + 1);
        }
        return transfers;
    }
}
