/** Base class of every failure the route map pipeline reports. All of them are fatal to a run. */
export class RouteMapError extends Error {
    readonly code: string;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Routes, customers, stations or convergence input that cannot be parsed or has the wrong shape */
export class MalformedInputError extends RouteMapError {
    constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super(message, 'MALFORMED_INPUT', details, options);
    }
}

/** Missing credentials or a rejected token exchange */
export class AuthError extends RouteMapError {
    constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
        super(message, 'AUTH_FAILED', details, options);
    }
}

export class TransportError extends RouteMapError {
    readonly status?: number;

    constructor(message: string, status?: number, options?: ErrorOptions) {
        super(message, 'TRANSPORT_FAILED', status === undefined ? undefined : { status }, options);
        this.status = status;
    }
}

/** The geocoding service answered, but with zero results */
export class NotFoundError extends RouteMapError {
    readonly postalCode: string;

    constructor(postalCode: string) {
        super(`No geocode result for postal ${postalCode}`, 'NOT_FOUND', { postalCode });
        this.postalCode = postalCode;
    }
}

export class CacheCorruptError extends RouteMapError {
    readonly path: string;

    constructor(path: string, reason: string, options?: ErrorOptions) {
        super(`Geocode cache ${path} is corrupt: ${reason}`, 'CACHE_CORRUPT', { path }, options);
        this.path = path;
    }
}

/** Wraps the lookup failure of a single postal code */
export class ResolutionError extends RouteMapError {
    readonly postalCode: string;

    constructor(postalCode: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to resolve postal ${postalCode}: ${reason}`, 'RESOLUTION_FAILED', { postalCode }, { cause });
        this.postalCode = postalCode;
    }
}
