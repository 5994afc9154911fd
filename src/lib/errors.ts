import type { ProviderErrorKind, ProviderId } from '../types';

export type ErrorCode =
    | 'INVALID_RANGE'
    | 'INVALID_REQUEST'
    | 'QUOTA_EXCEEDED'
    | 'PROVIDER_ERROR'
    | 'CANCELLED'
    | 'NO_PROVIDER'
    | 'ACQUISITION_FAILED'
    | 'MERGE_INVARIANT'
    | 'CONFIG';

export class WeatherArchiveError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidRangeError extends WeatherArchiveError {
    constructor(message: string) {
        super('INVALID_RANGE', message);
    }
}

export class RequestValidationError extends WeatherArchiveError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('INVALID_REQUEST', `Invalid fetch request: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export class QuotaExceededError extends WeatherArchiveError {
    readonly providerId: ProviderId;
    readonly resetsAt: Date;

    constructor(providerId: ProviderId, resetsAt: Date) {
        super('QUOTA_EXCEEDED', `${providerId} quota exhausted until ${resetsAt.toISOString()}`);
        this.providerId = providerId;
        this.resetsAt = resetsAt;
    }
}

export class ProviderError extends WeatherArchiveError {
    readonly providerId: ProviderId;
    readonly kind: ProviderErrorKind;
    readonly status?: number;
    readonly retryAfterMs?: number;

    constructor(
        providerId: ProviderId,
        kind: ProviderErrorKind,
        message: string,
        details: { status?: number; retryAfterMs?: number; cause?: unknown } = {}
    ) {
        super('PROVIDER_ERROR', message, { cause: details.cause });
        this.providerId = providerId;
        this.kind = kind;
        this.status = details.status;
        this.retryAfterMs = details.retryAfterMs;
    }
}

/** Thrown from abortable waits. Never surfaces from `submit` or `execute`. */
export class CancelledError extends WeatherArchiveError {
    constructor(message = 'Operation cancelled') {
        super('CANCELLED', message);
    }
}

export class NoProviderAvailableError extends WeatherArchiveError {
    constructor(message = 'No weather provider is available for this request') {
        super('NO_PROVIDER', message);
    }
}

export class AcquisitionFailedError extends WeatherArchiveError {
    constructor(message: string) {
        super('ACQUISITION_FAILED', message);
    }
}

export class MergeInvariantError extends WeatherArchiveError {
    constructor(message: string) {
        super('MERGE_INVARIANT', message);
    }
}

export class ConfigError extends WeatherArchiveError {
    constructor(message: string) {
        super('CONFIG', message);
    }
}

export function isCancelledError(error: unknown): error is CancelledError {
    return error instanceof CancelledError;
}
