import { Candidate } from './types';
import { InvalidCandidateError } from './errors';

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[+-]?\d+$/;

function checkRange(value: bigint, input: string): bigint {
    if (value < INT64_MIN || value > INT64_MAX) {
        throw new InvalidCandidateError(input, 'outside the signed 64-bit range');
    }
    return value;
}

export function toCandidate(value: Candidate): bigint {
    if (typeof value === 'bigint') {
        return checkRange(value, value.toString());
    }
    if (!Number.isSafeInteger(value)) {
        const shown = Number.isInteger(value) ? BigInt(value).toString() : String(value);
        throw new InvalidCandidateError(shown, 'not a safe integer; pass a bigint instead');
    }
    return BigInt(value);
}

/**
 * Parses a decimal integer such as a command line argument or a line from stdin.
 */
export function parseCandidate(text: string): bigint {
    const trimmed = text.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        throw new InvalidCandidateError(trimmed, 'not a decimal integer');
    }
    return checkRange(BigInt(trimmed), trimmed);
}
