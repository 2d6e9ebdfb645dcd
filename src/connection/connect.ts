/**
 * Opens a manager connection over TCP or TLS and optionally logs in.
 * @module connection/connect
 */
import * as net from 'net';
import * as tls from 'tls';
import type {ConnectionOptions as TlsConnectionOptions} from 'tls';

import {login} from '../actions/builders';
import {withTimeout} from '../actions/timeout';
import {AmiClient, type AmiClientOptions} from '../core/AmiClient';
import {AMI_DEFAULT_CONNECT_TIMEOUT_MS, AMI_DEFAULT_PORT} from '../protocol/constants';
import {AmiError, AmiResponseError} from '../protocol/errors';

/**
 * Configuration for {@link connect}.
 */
export type AmiConnectOptions = {
    /** Manager hostname or IP address. */
    host: string;
    /** Manager TCP/TLS port. Defaults to {@link AMI_DEFAULT_PORT}. */
    port?: number;
    /** Optional local interface address to bind for outbound connections. */
    localAddress?: string;
    /** Transport mode. Defaults to `'tcp'`. */
    transport?: 'tcp' | 'tls';
    /** Options forwarded to Node's `tls.connect()` when `transport` is `'tls'`. */
    tls?: Omit<TlsConnectionOptions, 'host' | 'port'>;
    /** Deadline for the socket to open and the greeting banner to arrive. */
    connectTimeoutMs?: number;
    /** Options for the {@link AmiClient} built on the socket. */
    client?: AmiClientOptions;
};

/**
 * Configuration for {@link connectAndLogin}.
 */
export type AmiLoginOptions = AmiConnectOptions & {
    username: string;
    secret: string;
    /** Event mask sent with `Login`: `on`, `off`, or a class list. */
    events?: string;
    /** Deadline for the `Login` response. Defaults to `connectTimeoutMs`. */
    loginTimeoutMs?: number;
};

const openSocket = (options: AmiConnectOptions, port: number): net.Socket => {
    if (options.transport === 'tls') {
        const tlsOptions = options.tls ?? {};
        return tls.connect({
            ...tlsOptions,
            host: options.host,
            port,
            servername: tlsOptions.servername ?? options.host,
        });
    }
    return net.createConnection({
        host: options.host,
        port,
        localAddress: options.localAddress,
    });
};

/**
 * Opens the socket and resolves with a client once the server's greeting
 * banner has arrived.
 */
export const connect = async (options: AmiConnectOptions): Promise<AmiClient> => {
    const port = options.port ?? AMI_DEFAULT_PORT;
    const timeoutMs = options.connectTimeoutMs ?? AMI_DEFAULT_CONNECT_TIMEOUT_MS;
    const client = new AmiClient(openSocket(options, port), options.client);
    const target = {host: options.host, port, transport: options.transport ?? 'tcp'};

    await new Promise<void>((resolve, reject) => {
        const cleanup = (): void => {
            clearTimeout(timeoutId);
            client.off('greeting', onGreeting);
            client.off('error', onError);
            client.off('close', onClose);
        };
        const fail = (error: AmiError): void => {
            cleanup();
            client.close();
            reject(error);
        };
        const onGreeting = (): void => {
            cleanup();
            resolve();
        };
        // The client closes itself after an error broadcast, with hadError set.
        const onError = (err: AmiError): void => {
            cleanup();
            reject(new AmiError({
                message: `Manager connection to ${options.host}:${port} failed: ${err.message}`,
                domain: 'transport',
                code: 'CONNECT_FAILED',
                details: target,
                cause: err,
            }));
        };
        const onClose = (): void => {
            fail(new AmiError({
                message: `Manager connection to ${options.host}:${port} closed before the greeting`,
                domain: 'transport',
                code: 'CONNECT_FAILED',
                details: target,
            }));
        };
        const timeoutId = setTimeout(() => {
            fail(new AmiError({
                message: `Manager connection to ${options.host}:${port} timed out after ${timeoutMs}ms`,
                domain: 'timeout',
                code: 'CONNECT_TIMEOUT',
                details: target,
            }));
        }, timeoutMs);

        client.on('greeting', onGreeting);
        client.on('error', onError);
        client.on('close', onClose);
    });
    return client;
};

/**
 * Connects, sends `Login`, and resolves with the ready client. A rejected
 * login closes the connection and throws `AmiResponseError(LOGIN_FAILED)`.
 */
export const connectAndLogin = async (options: AmiLoginOptions): Promise<AmiClient> => {
    const client = await connect(options);
    const timeoutMs = options.loginTimeoutMs ?? options.connectTimeoutMs ?? AMI_DEFAULT_CONNECT_TIMEOUT_MS;
    try {
        await withTimeout(
            client.queue(login({username: options.username, secret: options.secret, events: options.events})),
            timeoutMs,
            {action: 'Login'},
        );
    } catch (err) {
        client.close();
        if (err instanceof AmiResponseError) {
            throw new AmiResponseError(err.response, 'LOGIN_FAILED');
        }
        throw err;
    }
    return client;
};
