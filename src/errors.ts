/**
 * Failures raised by the game services. Each carries a stable `code` that is
 * sent to the client as the `error` field of the response body.
 */

export class AuthenticationError extends Error {
    readonly code = 'Unauthorized';

    constructor(message = 'Missing or unknown bearer token') {
        super(message);
        this.name = 'AuthenticationError';
    }
}

export class ValidationError extends Error {
    readonly code: string = 'InvalidPayload';

    constructor(message: string, readonly details?: unknown) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class UnknownUpgradeError extends ValidationError {
    override readonly code = 'UnknownUpgrade';

    constructor(readonly upgradeId: string) {
        super(`Unknown upgrade: ${upgradeId}`);
        this.name = 'UnknownUpgradeError';
    }
}

export class InsufficientFundsError extends ValidationError {
    override readonly code = 'InsufficientFunds';

    constructor(
        readonly upgradeId: string,
        readonly cost: number,
        readonly score: number,
    ) {
        super(`Not enough score to buy ${upgradeId}: costs ${cost}, have ${score}`);
        this.name = 'InsufficientFundsError';
    }
}

export class RateLimitError extends Error {
    readonly code = 'RateLimitExceeded';

    constructor(
        readonly clickCount: number,
        readonly maxClicks: number,
        readonly secondsPassed: number,
    ) {
        super(`Too many clicks: ${clickCount} submitted, at most ${maxClicks} allowed`);
        this.name = 'RateLimitError';
    }
}

export class NotFoundError extends Error {
    readonly code = 'NotFound';

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends Error {
    readonly code = 'Conflict';

    constructor(message: string) {
        super(message);
        this.name = 'ConflictError';
    }
}

export class GeneratorUnavailableError extends Error {
    readonly code = 'GeneratorUnavailable';

    constructor(message = 'Upgrade generation is not available') {
        super(message);
        this.name = 'GeneratorUnavailableError';
    }
}
