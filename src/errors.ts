export class PrimalityError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidCandidateError extends PrimalityError {
    constructor(readonly input: string, reason: string) {
        super(`Invalid candidate "${input}": ${reason}`);
    }
}

export class InvalidBaseError extends PrimalityError {
    constructor(readonly base: bigint | null, reason: string) {
        super(base === null ? `Invalid base table: ${reason}` : `Invalid base ${base}: ${reason}`);
    }
}
