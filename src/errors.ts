import { CandidateId } from './config';

export const ErrorCodes = {
    INVALID_BALLOT: 'INVALID_BALLOT',
    CANDIDATE_OVERFLOW: 'CANDIDATE_OVERFLOW',
    DUPLICATE_CANDIDATE: 'DUPLICATE_CANDIDATE',
    UNKNOWN_CANDIDATE: 'UNKNOWN_CANDIDATE',
    ROSTER_INCOMPLETE: 'ROSTER_INCOMPLETE',
    ELECTION_CLOSED: 'ELECTION_CLOSED',
    NO_REMAINING_CHOICE: 'NO_REMAINING_CHOICE',
    DEGENERATE_ELIMINATION: 'DEGENERATE_ELIMINATION',
    INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
    MALFORMED_BALLOT_FILE: 'MALFORMED_BALLOT_FILE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for everything the election library throws.
 */
export class ElectionError extends Error {
    constructor(
        message: string,
        public code: ErrorCode,
    ) {
        super(message);
        this.name = 'ElectionError';
    }
}

/** a ranking that is not a permutation of 1..n. recoverable: reject the ballot and continue */
export class InvalidBallotError extends ElectionError {
    constructor(public ranks: readonly number[], public candidateCount: number) {
        super(`Invalid ballot [${ranks.join(', ')}]: expected a permutation of 1..${candidateCount}`, ErrorCodes.INVALID_BALLOT);
        this.name = 'InvalidBallotError';
    }
}

/** more candidates were added than the election was sized for */
export class CandidateOverflowError extends ElectionError {
    constructor(public capacity: number) {
        super(`Election is sized for ${capacity} candidate(s) and is already full`, ErrorCodes.CANDIDATE_OVERFLOW);
        this.name = 'CandidateOverflowError';
    }
}

/** a candidate was eliminated twice */
export class DegenerateEliminationError extends ElectionError {
    constructor(public candidate: CandidateId, message: string) {
        super(message, ErrorCodes.DEGENERATE_ELIMINATION);
        this.name = 'DegenerateEliminationError';
    }
}

/** ballots appeared or disappeared during tabulation */
export class InvariantViolationError extends ElectionError {
    constructor(message: string) {
        super(message, ErrorCodes.INVARIANT_VIOLATION);
        this.name = 'InvariantViolationError';
    }
}

export class BallotFileError extends ElectionError {
    constructor(message: string, public line: number) {
        super(`line ${line}: ${message}`, ErrorCodes.MALFORMED_BALLOT_FILE);
        this.name = 'BallotFileError';
    }
}
