export type { Candidate, Decomposition, PrimalityOptions, Verdict } from './types';
export { PrimalityError, InvalidCandidateError, InvalidBaseError } from './errors';
export { INT64_MIN, INT64_MAX, toCandidate, parseCandidate } from './candidate';
export { mulMod, powMod } from './modularArithmetic';
export { decompose, isWitnessComposite } from './witness';
export {
    DETERMINISTIC_BASES,
    DETERMINISTIC_BASES_LIMIT,
    FIRST_TWELVE_PRIME_BASES,
    isPrime,
    classify
} from './primeCalculator';
export { formatVerdict, evaluateInput } from './main';
