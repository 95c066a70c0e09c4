export type ErrorCode =
    | 'missing_api_key'
    | 'invalid_api_key'
    | 'validation_error'
    | 'not_found'
    | 'bad_request'
    | 'internal_error';

export type ErrorDetails = Record<string, string[]> | string;

export interface ErrorBody {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
    missing_api_key: 401,
    invalid_api_key: 401,
    validation_error: 400,
    not_found: 404,
    bad_request: 400,
    internal_error: 500,
};

/**
 * Failure that maps directly onto an HTTP error response.
 */
export class ApiError extends Error {
    readonly status: number;

    constructor(
        readonly code: ErrorCode,
        message: string,
        readonly details?: ErrorDetails,
    ) {
        super(message);
        this.name = 'ApiError';
        this.status = STATUS_BY_CODE[code];
    }

    toBody(): ErrorBody {
        const body: ErrorBody = { code: this.code, message: this.message };
        if (this.details !== undefined) {
            body.details = this.details;
        }
        return body;
    }
}
