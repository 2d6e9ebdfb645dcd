/**
 * Connection lifecycle rules: drain-then-close versus close-now.
 * @module core/lifecycle
 *
 * `open` accepts actions. `ending` refuses new ones and closes once the last
 * pending request settles. `closed` is terminal.
 */
export enum AmiConnectionState {
    Open = 'open',
    Ending = 'ending',
    Closed = 'closed',
}

export type QueueRejection = 'CONNECTION_ENDING' | 'CONNECTION_CLOSED';

export const canQueue = (state: AmiConnectionState): boolean => state === AmiConnectionState.Open;

/** The error kind a refused `queue` gets in `state`, or `null` when queuing is allowed. */
export const queueRejection = (state: AmiConnectionState): QueueRejection | null => {
    switch (state) {
        case AmiConnectionState.Open:
            return null;
        case AmiConnectionState.Ending:
            return 'CONNECTION_ENDING';
        case AmiConnectionState.Closed:
            return 'CONNECTION_CLOSED';
    }
};

/** State after a graceful `end()` request. Only `open` moves. */
export const nextStateOnEnd = (state: AmiConnectionState, pendingCount: number): AmiConnectionState => {
    if (state !== AmiConnectionState.Open) return state;
    return pendingCount === 0 ? AmiConnectionState.Closed : AmiConnectionState.Ending;
};

/** True once an ending connection has nothing left to wait for. */
export const shouldFinishDrain = (state: AmiConnectionState, pendingCount: number): boolean =>
    state === AmiConnectionState.Ending && pendingCount === 0;
