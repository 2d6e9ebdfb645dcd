/**
 * Correlation and dispatch engine for one manager connection.
 * @module core/AmiClient
 */
import {randomUUID} from 'crypto';
import {EventEmitter} from 'events';

import {
    AmiError,
    AmiFramingError,
    AmiResponseError,
    connectionError,
    toAmiError,
} from '../protocol/errors';
import {AmiFrameDecoder} from '../protocol/decoder';
import {classifyBlock} from '../protocol/classifier';
import type {AmiRawBlock} from '../protocol/fields';
import type {AmiAction, AmiEvent, AmiResponse} from '../protocol/message';
import {
    AmiConnectionState,
    canQueue,
    nextStateOnEnd,
    queueRejection,
    shouldFinishDrain,
} from './lifecycle';
import {type AmiLogger, consoleLogger} from './logger';

/**
 * The already-open duplex stream a client runs on. `net.Socket` and
 * `tls.TLSSocket` both fit.
 */
export interface AmiTransport {
    write(data: string, callback?: (err?: Error | null) => void): boolean;
    end(): unknown;
    destroy(error?: Error): unknown;
    on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
    on(event: 'close', listener: (hadError: boolean) => void): unknown;
}

export type AmiClientOptions = {
    /** Prefix for generated `ActionID`s. Defaults to 8 random hex characters and `-`. */
    actionIdPrefix?: string;
    /** Cap on buffered bytes without a block terminator. */
    maxBufferBytes?: number;
    /** Diagnostics sink. Defaults to {@link consoleLogger}. */
    logger?: AmiLogger;
};

/**
 * Typed channels emitted by {@link AmiClient}.
 */
export interface AmiClientEvents {
    /** Every classified inbound event, in stream order. */
    event: [event: AmiEvent];
    /** Protocol banner sent by the server as the first line. */
    greeting: [banner: string];
    /** Lifecycle transitions. */
    state: [state: AmiConnectionState];
    /** Emitted once when the connection reaches `closed`. */
    close: [hadError: boolean];
    /** Transport faults and framing corruption. Always followed by `close`. */
    error: [error: AmiError];
}

type PendingEntry = {
    sequence: number;
    action: AmiAction;
    resolve: (response: AmiResponse) => void;
    reject: (error: Error) => void;
};

/**
 * Sends actions, matches responses to them by `ActionID` and fans events
 * out to subscribers.
 *
 * The core has no timeouts: a request stays pending until its response
 * arrives or the connection closes.
 */
export class AmiClient extends EventEmitter<AmiClientEvents> {
    private readonly transport: AmiTransport;
    private readonly logger: AmiLogger;
    private readonly actionIdPrefix: string;
    private readonly decoder: AmiFrameDecoder;
    private readonly pending = new Map<string, PendingEntry>();

    private connectionState = AmiConnectionState.Open;
    private actionIdCounter = 0;
    private sequence = 0;
    private banner: string | null = null;

    constructor(transport: AmiTransport, options: AmiClientOptions = {}) {
        super();
        this.transport = transport;
        this.logger = options.logger ?? consoleLogger;
        this.actionIdPrefix = options.actionIdPrefix ?? `${randomUUID().slice(0, 8)}-`;
        this.decoder = new AmiFrameDecoder({
            maxBufferBytes: options.maxBufferBytes,
            onGreeting: (banner) => {
                this.banner = banner;
                this.broadcast('greeting', banner);
            },
            onMalformedLine: (line) => {
                this.logger.debug('Skipping manager line without separator', {line});
            },
            onTruncatedBlock: (fields) => {
                this.logger.debug('Dropping unterminated manager block', {fieldCount: fields.length});
            },
        });

        transport.on('data', (chunk) => this.handleData(chunk));
        transport.on('error', (err) => this.handleTransportError(err));
        transport.on('close', (hadError) => this.shutdown(hadError, 'none'));
    }

    /** Current lifecycle state. */
    public get state(): AmiConnectionState {
        return this.connectionState;
    }

    /** Number of actions awaiting a response. */
    public get pendingCount(): number {
        return this.pending.size;
    }

    /** Server banner, once received. */
    public get greeting(): string | null {
        return this.banner;
    }

    public isOpen(): boolean {
        return canQueue(this.connectionState);
    }

    /**
     * Writes an action and resolves with its response.
     *
     * An `ActionID` is generated when the action has none. A response whose
     * status is `Error` rejects with {@link AmiResponseError}.
     */
    public queue(action: AmiAction): Promise<AmiResponse> {
        const refusal = queueRejection(this.connectionState);
        if (refusal) {
            return Promise.reject(connectionError(refusal, {action: action.name}));
        }

        let id = action.actionId;
        let outgoing = action;
        if (id === undefined) {
            id = this.nextActionId();
            outgoing = action.withActionId(id);
        } else if (this.pending.has(id)) {
            return Promise.reject(new AmiError({
                message: `ActionID "${id}" is already pending`,
                domain: 'action',
                code: 'DUPLICATE_ACTION_ID',
                details: {actionId: id, action: action.name},
            }));
        }

        const actionId = id;
        return new Promise<AmiResponse>((resolve, reject) => {
            this.sequence += 1;
            const entry: PendingEntry = {sequence: this.sequence, action: outgoing, resolve, reject};
            // Registered before the write so a reply can never outrun its entry.
            this.pending.set(actionId, entry);
            try {
                this.transport.write(outgoing.serialize(), (err) => {
                    if (err) this.failWrite(actionId, entry, err);
                });
            } catch (err) {
                this.failWrite(actionId, entry, err);
            }
        });
    }

    /**
     * Subscribes to events whose `Event` field matches `eventName`
     * (case-insensitive, `'*'` for all). Returns the unsubscribe function.
     */
    public onEvent(eventName: string, handler: (event: AmiEvent) => void): () => void {
        const wanted = eventName.toLowerCase();
        const listener = (event: AmiEvent): void => {
            if (wanted === '*' || event.name.toLowerCase() === wanted) handler(event);
        };
        this.on('event', listener);
        return () => {
            this.off('event', listener);
        };
    }

    /** Stops accepting actions and closes once every pending one has settled. */
    public end(): void {
        const next = nextStateOnEnd(this.connectionState, this.pending.size);
        if (next === this.connectionState) return;
        if (next === AmiConnectionState.Closed) {
            this.shutdown(false, 'end');
        } else {
            this.setState(next);
        }
    }

    /** Closes now, rejecting every pending action with `CONNECTION_CLOSED`. */
    public close(): void {
        this.shutdown(false, 'destroy');
    }

    private handleData(chunk: Buffer | string): void {
        if (this.connectionState === AmiConnectionState.Closed) return;

        let blocks: AmiRawBlock[];
        try {
            blocks = this.decoder.push(chunk);
        } catch (err) {
            // Blocks closed ahead of the overflow are still valid.
            if (err instanceof AmiFramingError) this.dispatchBlocks(err.completed);
            if (this.state === AmiConnectionState.Closed) return;
            this.broadcast('error', toAmiError(err, 'protocol', 'STREAM_FRAMING_ERROR'));
            this.shutdown(true, 'destroy');
            return;
        }
        this.dispatchBlocks(blocks);
    }

    private dispatchBlocks(blocks: readonly AmiRawBlock[]): void {
        for (const block of blocks) {
            if (this.connectionState === AmiConnectionState.Closed) return;
            const message = classifyBlock(block);
            if (message === null) {
                this.logger.debug('Dropping unclassifiable manager block', {
                    fields: block.map((field) => field.name),
                });
            } else if (message.kind === 'response') {
                this.handleResponse(message);
            } else {
                this.broadcast('event', message);
            }
        }
    }

    private handleResponse(response: AmiResponse): void {
        const id = response.actionId;
        const entry = id === undefined ? undefined : this.pending.get(id);
        if (id === undefined || entry === undefined) {
            this.logger.debug('Dropping unmatched manager response', {
                actionId: id ?? null,
                status: response.status,
            });
            return;
        }

        this.pending.delete(id);
        if (response.isError()) {
            entry.reject(new AmiResponseError(response));
        } else {
            entry.resolve(response);
        }
        this.finishDrainIfIdle();
    }

    private handleTransportError(err: Error): void {
        if (this.connectionState === AmiConnectionState.Closed) {
            this.logger.debug('Ignoring transport error after close', {error: err.message});
            return;
        }
        this.broadcast('error', toAmiError(err, 'transport', 'TRANSPORT_ERROR'));
        this.shutdown(true, 'destroy');
    }

    private failWrite(id: string, entry: PendingEntry, err: unknown): void {
        if (this.pending.get(id) !== entry) return;
        this.pending.delete(id);
        entry.reject(toAmiError(err, 'transport', 'WRITE_FAILED', {actionId: id, action: entry.action.name}));
        this.finishDrainIfIdle();
    }

    private finishDrainIfIdle(): void {
        if (shouldFinishDrain(this.connectionState, this.pending.size)) {
            this.shutdown(false, 'end');
        }
    }

    private shutdown(hadError: boolean, release: 'end' | 'destroy' | 'none'): void {
        if (this.connectionState === AmiConnectionState.Closed) return;
        this.setState(AmiConnectionState.Closed);
        // Ends the block sequence; a half-received block is reported and dropped.
        this.decoder.finish();

        const entries = Array.from(this.pending.entries()).sort(([, a], [, b]) => a.sequence - b.sequence);
        this.pending.clear();
        for (const [actionId, entry] of entries) {
            entry.reject(connectionError('CONNECTION_CLOSED', {actionId, action: entry.action.name}));
        }

        if (release === 'end') {
            this.transport.end();
        } else if (release === 'destroy') {
            this.transport.destroy();
        }
        this.broadcast('close', hadError);
    }

    private nextActionId(): string {
        let id: string;
        do {
            this.actionIdCounter += 1;
            id = `${this.actionIdPrefix}${this.actionIdCounter}`;
        } while (this.pending.has(id));
        return id;
    }

    private setState(next: AmiConnectionState): void {
        if (next === this.connectionState) return;
        this.connectionState = next;
        this.broadcast('state', next);
    }

    /**
     * Calls each subscriber of `channel` in registration order. A throwing
     * subscriber is logged and the rest still run. An `error` with no
     * subscriber is logged instead of thrown.
     */
    private broadcast<K extends keyof AmiClientEvents>(channel: K, ...args: AmiClientEvents[K]): void {
        this.fanOut(channel, args);
    }

    private fanOut(channel: keyof AmiClientEvents, args: readonly unknown[]): void {
        const listeners = this.rawListeners(channel);
        if (channel === 'error' && listeners.length === 0) {
            const [error] = args;
            this.logger.warn('Unhandled manager client error', {
                error: error instanceof Error ? error.message : String(error),
            });
            return;
        }
        for (const listener of listeners) {
            try {
                Reflect.apply(listener, this, args);
            } catch (err) {
                this.logger.warn(`Manager client "${channel}" handler failed`, {
                    error: err instanceof Error ? err.message : String(err),
                });
            }
        }
    }
}
