/**
 * Structured manager protocol error taxonomy.
 * @module protocol/errors
 */
import type {AmiRawBlock} from './fields';
import type {AmiResponse} from './message';

export type AmiErrorDomain = 'transport' | 'connection' | 'protocol' | 'action' | 'timeout';

export type AmiErrorCode =
    | 'TRANSPORT_ERROR'
    | 'CONNECTION_CLOSED'
    | 'CONNECTION_ENDING'
    | 'DUPLICATE_ACTION_ID'
    | 'WRITE_FAILED'
    | 'STREAM_FRAMING_ERROR'
    | 'ACTION_FAILED'
    | 'RESPONSE_TIMEOUT'
    | 'CONNECT_FAILED'
    | 'CONNECT_TIMEOUT'
    | 'LOGIN_FAILED';

export type AmiErrorParams = {
    message: string;
    domain: AmiErrorDomain;
    code: AmiErrorCode;
    details?: Record<string, unknown>;
    cause?: unknown;
};

export class AmiError extends Error {
    public readonly domain: AmiErrorDomain;
    public readonly code: AmiErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: AmiErrorParams) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'AmiError';
        this.domain = params.domain;
        this.code = params.code;
        this.details = params.details;
    }
}

/**
 * A well-formed response that reports failure. The full response stays
 * available so callers can read the server's reason.
 */
export class AmiResponseError extends AmiError {
    public readonly response: AmiResponse;

    constructor(response: AmiResponse, code: 'ACTION_FAILED' | 'LOGIN_FAILED' = 'ACTION_FAILED') {
        super({
            message: response.message ?? `Manager responded with status "${response.status}"`,
            domain: 'action',
            code,
            details: {actionId: response.actionId, status: response.status},
        });
        this.name = 'AmiResponseError';
        this.response = response;
    }
}

/**
 * The unterminated tail outgrew the buffer cap. `completed` holds the blocks
 * the same chunk closed before the overflow.
 */
export class AmiFramingError extends AmiError {
    public readonly completed: readonly AmiRawBlock[];

    constructor(message: string, completed: readonly AmiRawBlock[], details?: Record<string, unknown>) {
        super({message, domain: 'protocol', code: 'STREAM_FRAMING_ERROR', details});
        this.name = 'AmiFramingError';
        this.completed = completed;
    }
}

const CONNECTION_ERROR_META = {
    CONNECTION_CLOSED: 'Manager connection closed',
    CONNECTION_ENDING: 'Manager connection is ending; no new actions accepted',
} as const;

export const connectionError = (
    code: keyof typeof CONNECTION_ERROR_META,
    details?: Record<string, unknown>,
): AmiError => new AmiError({
    message: CONNECTION_ERROR_META[code],
    domain: 'connection',
    code,
    details,
});

/** Narrows `err` to an {@link AmiError}, optionally of one code. */
export const isAmiError = (err: unknown, code?: AmiErrorCode): err is AmiError =>
    err instanceof AmiError && (code === undefined || err.code === code);

/** Wraps any thrown value as an {@link AmiError}, passing existing ones through. */
export const toAmiError = (
    err: unknown,
    domain: AmiErrorDomain,
    code: AmiErrorCode,
    details?: Record<string, unknown>,
): AmiError => {
    if (err instanceof AmiError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new AmiError({message, domain, code, details, cause: err});
};
