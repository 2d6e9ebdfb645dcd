/**
 * Optional response deadline layered above {@link AmiClient.queue}.
 * @module actions/timeout
 */
import type {AmiClient} from '../core/AmiClient';
import {AmiError} from '../protocol/errors';
import type {AmiAction, AmiResponse} from '../protocol/message';

/**
 * Settles like `operation`, or rejects with `AmiError(RESPONSE_TIMEOUT)`
 * once `timeoutMs` passes first.
 */
export const withTimeout = <T>(
    operation: Promise<T>,
    timeoutMs: number,
    details?: Record<string, unknown>,
): Promise<T> => {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        return Promise.reject(new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`));
    }
    return new Promise<T>((resolve, reject) => {
        const timeoutId = setTimeout(() => {
            reject(new AmiError({
                message: `Manager response timed out after ${timeoutMs}ms`,
                domain: 'timeout',
                code: 'RESPONSE_TIMEOUT',
                details,
            }));
        }, timeoutMs);
        operation.then(
            (value) => {
                clearTimeout(timeoutId);
                resolve(value);
            },
            (err: unknown) => {
                clearTimeout(timeoutId);
                reject(err);
            },
        );
    });
};

/**
 * Queues `action` and gives up waiting after `timeoutMs`.
 *
 * The engine has no cancellation: the request stays pending there until a
 * response arrives or the connection closes.
 */
export const queueWithTimeout = (client: AmiClient, action: AmiAction, timeoutMs: number): Promise<AmiResponse> =>
    withTimeout(client.queue(action), timeoutMs, {action: action.name});
