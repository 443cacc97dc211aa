import { INT64_MAX, INT64_MIN, parseCandidate, toCandidate } from '../src/candidate';
import { InvalidCandidateError, PrimalityError } from '../src/errors';

describe('parseCandidate', () => {
    test('accepts signed decimal integers with surrounding whitespace', () => {
        expect(parseCandidate('17')).toBe(17n);
        expect(parseCandidate('  +42\n')).toBe(42n);
        expect(parseCandidate('-5')).toBe(-5n);
        expect(parseCandidate('007')).toBe(7n);
    });

    test('accepts both ends of the signed 64-bit range', () => {
        expect(parseCandidate('9223372036854775807')).toBe(INT64_MAX);
        expect(parseCandidate('-9223372036854775808')).toBe(INT64_MIN);
    });

    test('rejects values one past either end', () => {
        expect(() => parseCandidate('9223372036854775808')).toThrow(
            'Invalid candidate "9223372036854775808": outside the signed 64-bit range'
        );
        expect(() => parseCandidate('-9223372036854775809')).toThrow(InvalidCandidateError);
    });

    test('rejects text that is not a decimal integer', () => {
        for (const text of ['', 'abc', '1e3', '0x11', '3.0', '1 2', '--1']) {
            expect(() => parseCandidate(text)).toThrow(InvalidCandidateError);
        }
        expect(() => parseCandidate(' abc ')).toThrow('Invalid candidate "abc": not a decimal integer');
    });
});

describe('toCandidate', () => {
    test('passes bigints in range through', () => {
        expect(toCandidate(INT64_MAX)).toBe(INT64_MAX);
        expect(toCandidate(-1n)).toBe(-1n);
    });

    test('converts safe integers', () => {
        expect(toCandidate(7919)).toBe(7919n);
        expect(toCandidate(Number.MAX_SAFE_INTEGER)).toBe(9007199254740991n);
    });

    test('rejects unsafe numbers with a hint', () => {
        expect(() => toCandidate(2 ** 60)).toThrow(
            'Invalid candidate "1152921504606846976": not a safe integer; pass a bigint instead'
        );
        expect(() => toCandidate(Infinity)).toThrow(InvalidCandidateError);
    });

    test('echoes large unsafe integers digit for digit', () => {
        expect(() => toCandidate(2 ** 53)).toThrow('Invalid candidate "9007199254740992"');
        expect(() => toCandidate(-(2 ** 63))).toThrow('Invalid candidate "-9223372036854775808"');
    });

    test('errors share the package base class', () => {
        let caught: unknown = null;
        try {
            toCandidate(0.5);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(PrimalityError);
        expect(caught).toBeInstanceOf(InvalidCandidateError);
        expect(caught instanceof Error && caught.name).toBe('InvalidCandidateError');
    });
});
