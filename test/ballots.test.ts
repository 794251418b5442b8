/**
 * Ballot tests
 */

import { describe, it, expect } from '@jest/globals';
import { Ballot, isBallotValid, preferencesToRanks } from '../src/ballots';
import { ElectionError, ErrorCodes } from '../src/errors';
import { thrown } from './helpers';

describe('isBallotValid', () => {
    it('should accept permutations of 1..n', () => {
        expect(isBallotValid([1, 2, 3], 3)).toBe(true);
        expect(isBallotValid([3, 1, 2], 3)).toBe(true);
        expect(isBallotValid([1], 1)).toBe(true);
    });

    it('should reject duplicate ranks', () => {
        expect(isBallotValid([1, 1, 2], 3)).toBe(false);
    });

    it('should reject out-of-range ranks', () => {
        expect(isBallotValid([0, 1, 2], 3)).toBe(false);
        expect(isBallotValid([1, 2, 4], 3)).toBe(false);
    });

    it('should reject rankings of the wrong length', () => {
        expect(isBallotValid([1, 2], 3)).toBe(false);
        expect(isBallotValid([1, 2, 3, 4], 3)).toBe(false);
    });

    it('should not reorder the ranking it checks', () => {
        const ranks = [3, 1, 2];
        isBallotValid(ranks, 3);
        expect(ranks).toEqual([3, 1, 2]);
    });
});

describe('Ballot', () => {
    it('should return the candidate ranked first', () => {
        expect(new Ballot([1, 2, 3]).getTopCandidate()).toBe(0);
        expect(new Ballot([2, 3, 1]).getTopCandidate()).toBe(2);
    });

    it('should skip eliminated candidates', () => {
        const ballot = new Ballot([2, 3, 1]);
        ballot.eliminateCandidate(2);
        expect(ballot.getTopCandidate()).toBe(0);
        ballot.eliminateCandidate(0);
        expect(ballot.getTopCandidate()).toBe(1);
    });

    it('should treat repeated eliminations as one', () => {
        const ballot = new Ballot([1, 2, 3]);
        ballot.eliminateCandidate(0);
        ballot.eliminateCandidate(0);
        expect(ballot.getTopCandidate()).toBe(1);
    });

    it('should fail when no candidate remains', () => {
        const ballot = new Ballot([1, 2]);
        ballot.eliminateCandidate(0);
        ballot.eliminateCandidate(1);
        const err = thrown(() => ballot.getTopCandidate());
        expect(err).toBeInstanceOf(ElectionError);
        expect(err).toMatchObject({ code: ErrorCodes.NO_REMAINING_CHOICE });
    });

    it('should reject candidates that are not on the ballot', () => {
        const ballot = new Ballot([1, 2]);
        expect(() => ballot.eliminateCandidate(2)).toThrow('Candidate 2 is not on this ballot');
    });

    it('should keep its own copy of the ranking', () => {
        const ranks = [1, 2, 3];
        const ballot = new Ballot(ranks);
        ranks[0] = 3;
        ranks[2] = 1;
        expect(ballot.ranks).toEqual([1, 2, 3]);
        expect(ballot.getTopCandidate()).toBe(0);
    });
});

describe('preferencesToRanks', () => {
    it('should convert a preference order into ranks by candidate', () => {
        expect(preferencesToRanks(['B', 'C', 'A'], ['A', 'B', 'C'])).toEqual([3, 1, 2]);
    });

    it('should leave unranked candidates at 0', () => {
        expect(preferencesToRanks(['A'], ['A', 'B', 'C'])).toEqual([1, 0, 0]);
    });

    it('should return null for unknown or repeated candidates', () => {
        expect(preferencesToRanks(['A', 'D', 'B'], ['A', 'B', 'C'])).toBeNull();
        expect(preferencesToRanks(['A', 'A', 'B'], ['A', 'B', 'C'])).toBeNull();
    });
});
