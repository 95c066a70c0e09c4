import { ApiError } from '../../src/api/errors.js';

export function captureError(fn: () => unknown): ApiError {
    try {
        fn();
    } catch (err) {
        if (err instanceof ApiError) return err;
        throw err;
    }
    throw new Error('Expected an ApiError');
}

export async function captureAsyncError(promise: Promise<unknown>): Promise<ApiError> {
    try {
        await promise;
    } catch (err) {
        if (err instanceof ApiError) return err;
        throw err;
    }
    throw new Error('Expected an ApiError');
}
