export {
    CandidateId,
    Rational,
    ConfigQuorum,
    ElectionConfig,
    BallotCounts,
    passesThreshold,
    passesQuorumCheck,
    majorityThreshold,
    hasMajority,
} from './config';
export {
    ErrorCodes,
    ErrorCode,
    ElectionError,
    InvalidBallotError,
    CandidateOverflowError,
    DegenerateEliminationError,
    InvariantViolationError,
    BallotFileError,
} from './errors';
export { Ballot, isBallotValid, preferencesToRanks } from './ballots';
export { Candidate } from './candidate';
export { Election, CandidateView, IrvStatus, IrvResult, IrvEventType, IrvEvent, remapIrvEvent, remapIrvResult } from './election';
export { ElectionStatus, ElectionOutcome, remapOutcome, runConfigElection, runMappedConfigElection } from './config-election';
export { BallotFile, parseBallotFile } from './ballot-file';
export { formatOutcome } from './format';
