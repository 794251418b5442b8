// Shared helpers for election tests

import { CandidateView, Election } from '../src/election';

/** calls `fn` and returns what it threw */
export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected the call to throw');
}

/** builds a fully populated election */
export function buildElection(names: string[], ballots: number[][]): Election {
    const election = new Election(names.length);
    for (const name of names) election.addCandidate(name);
    for (const ranks of ballots) election.addBallot(ranks);
    return election;
}

/** repeats a ranking `count` times */
export function times(count: number, ranks: number[]): number[][] {
    return Array.from({ length: count }, () => ranks.slice());
}

/** a fixed candidate view named `c<id>` */
export function candidateView(id: number, votes: number, eliminated = false): CandidateView {
    return {
        id,
        getName: () => `c${id}`,
        getVotes: () => votes,
        isEliminated: () => eliminated,
    };
}
