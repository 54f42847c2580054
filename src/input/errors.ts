export class InputAttemptsExceededError extends Error {
    readonly name = 'InputAttemptsExceededError';

    constructor(
        readonly field: string,
        readonly attempts: number,
    ) {
        super(`No valid value for ${field} after ${attempts} attempts`);
    }
}

export class InputClosedError extends Error {
    readonly name = 'InputClosedError';

    constructor() {
        super('Input stream closed before all readings were entered');
    }
}

export class ReadingsFileError extends Error {
    readonly name = 'ReadingsFileError';

    constructor(
        readonly path: string,
        message: string,
    ) {
        super(message);
    }
}
