import { Ballot } from './ballots';
import { CandidateId } from './config';
import { DegenerateEliminationError } from './errors';

/**
 * A contestant. Holds every ballot on which it is currently the top eligible choice.
 */
export class Candidate {
    readonly id: CandidateId;
    readonly name: string;
    #ballots: Ballot[] = [];
    #eliminated = false;

    constructor(id: CandidateId, name: string) {
        this.id = id;
        this.name = name;
    }

    getName(): string {
        return this.name;
    }

    /** gives this candidate a ballot. the caller must make sure no other candidate holds it */
    addBallot(ballot: Ballot) {
        this.#ballots.push(ballot);
    }

    /** number of ballots currently held */
    getVotes(): number {
        return this.#ballots.length;
    }

    isEliminated(): boolean {
        return this.#eliminated;
    }

    /**
     * Removes this candidate from contention and hands back all of its ballots for redistribution.
     * A candidate can only be eliminated once.
     */
    eliminate(): Ballot[] {
        if (this.#eliminated) {
            throw new DegenerateEliminationError(this.id, `Candidate ${this.name} has already been eliminated`);
        }
        this.#eliminated = true;

        const ballots = this.#ballots;
        this.#ballots = [];
        return ballots;
    }
}
