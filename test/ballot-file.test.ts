/**
 * Ballot file tests
 */

import { describe, it, expect } from '@jest/globals';
import { parseBallotFile } from '../src/ballot-file';
import { BallotFileError, ErrorCodes } from '../src/errors';
import { thrown } from './helpers';

describe('parseBallotFile', () => {
    it('should read the roster and ballots', () => {
        const file = parseBallotFile('# board election\nAda, Grace, Linus\n\n1, 2, 3\n3,1,2\n');
        expect(file).toEqual({
            candidates: ['Ada', 'Grace', 'Linus'],
            ballots: [[1, 2, 3], [3, 1, 2]],
            lines: [4, 5],
        });
    });

    it('should accept windows line endings', () => {
        const file = parseBallotFile('A,B\r\n2,1\r\n');
        expect(file.candidates).toEqual(['A', 'B']);
        expect(file.ballots).toEqual([[2, 1]]);
    });

    it('should leave ranking validation to the election', () => {
        const file = parseBallotFile('A,B,C\n1,1\n');
        expect(file.ballots).toEqual([[1, 1]]);
    });

    it('should reject ranks that are not integers', () => {
        const err = thrown(() => parseBallotFile('A,B\n1,x\n'));
        expect(err).toBeInstanceOf(BallotFileError);
        expect(err).toMatchObject({
            code: ErrorCodes.MALFORMED_BALLOT_FILE,
            line: 2,
            message: 'line 2: expected an integer rank, got “x”',
        });
    });

    it('should reject a file without a roster', () => {
        expect(thrown(() => parseBallotFile('# nothing here\n\n'))).toMatchObject({
            line: 1,
            message: 'line 1: missing candidate list',
        });
    });

    it('should reject empty candidate names', () => {
        expect(thrown(() => parseBallotFile('\nA,,B\n'))).toMatchObject({
            line: 2,
            message: 'line 2: candidate names cannot be empty',
        });
    });
});
