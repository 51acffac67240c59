export class StravaApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly retryable: boolean
    ) {
        super(message);
        this.name = 'StravaApiError';
    }
}

export class StravaUnauthenticatedError extends StravaApiError {
    // Recovered by a token refresh, never by resending the same token
    constructor(message = 'Access token expired or invalid') {
        super(message, 401, false);
        this.name = 'StravaUnauthenticatedError';
    }
}

export class StravaForbiddenError extends StravaApiError {
    constructor(message = 'Forbidden: the token lacks the activity:read_all scope') {
        super(message, 403, false);
        this.name = 'StravaForbiddenError';
    }
}

export class StravaRateLimitError extends StravaApiError {
    constructor(
        public readonly retryAfterSeconds: number,
        message = 'Strava request quota exhausted'
    ) {
        // Quotas reset per 15-minute window, so the run stops rather than waits
        super(message, 429, false);
        this.name = 'StravaRateLimitError';
    }
}

export class StravaDownError extends StravaApiError {
    constructor(statusCode: number, message = 'Strava service unavailable') {
        super(message, statusCode, true);
        this.name = 'StravaDownError';
    }
}

// Token refresh failures; isRevoked means the refresh token itself is dead
export class TokenRefreshError extends Error {
    constructor(
        message: string,
        public readonly isRevoked: boolean,
        public readonly stravaError?: string
    ) {
        super(message);
        this.name = 'TokenRefreshError';
    }
}

// The per-run request budget ran out before a retry could be sent
export class RequestCapReachedError extends Error {
    constructor(message = 'Request cap reached') {
        super(message);
        this.name = 'RequestCapReachedError';
    }
}
