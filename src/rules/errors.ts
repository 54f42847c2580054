export class UnknownVitalError extends Error {
    readonly name = 'UnknownVitalError';

    constructor(readonly vitalName: string) {
        super(`Unknown vital: ${vitalName}`);
    }
}

export class MissingFieldError extends Error {
    readonly name = 'MissingFieldError';

    constructor(readonly field: string) {
        super(`Reading set is missing a numeric value for field: ${field}`);
    }
}
