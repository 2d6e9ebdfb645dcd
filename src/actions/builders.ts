/**
 * Builders for well-known manager actions.
 * @module actions/builders
 *
 * Each builder only assembles fields; correlation and sending belong to
 * {@link AmiClient.queue}.
 */
import {AmiAction} from '../protocol/message';

/** `on`, `off`, or a comma-separated class list such as `call,system`. */
export type AmiEventMask = 'on' | 'off' | string;

export type LoginOptions = {
    username: string;
    secret: string;
    /** Event classes to receive on this session. Server default when omitted. */
    events?: AmiEventMask;
};

export type StatusOptions = {
    /** Restrict the report to one channel. */
    channel?: string;
    /** Channel variables to include in each status event. */
    variables?: string[];
};

export type GetVarOptions = {
    variable: string;
    /** Channel to read from; global variable when omitted. */
    channel?: string;
};

export type SetVarOptions = GetVarOptions & {
    value: string;
};

export type HangupOptions = {
    channel: string;
    /** Q.850 cause code. */
    cause?: number;
};

export type OriginateOptions = {
    channel: string;
    context?: string;
    exten?: string;
    priority?: number;
    /** Dialplan application to run instead of `context`/`exten`/`priority`. */
    application?: string;
    data?: string;
    callerId?: string;
    /** Ring timeout in milliseconds. */
    timeoutMs?: number;
    account?: string;
    /** Channel variables, sent as one `Variable: name=value` field each. */
    variables?: Record<string, string>;
    /** Return as soon as the originate is accepted instead of when it finishes. */
    async?: boolean;
};

export type RedirectOptions = {
    channel: string;
    context: string;
    exten: string;
    priority: number;
    /** Second channel to move along with the first (e.g. the bridged peer). */
    extraChannel?: string;
};

export const login = ({username, secret, events: eventMask}: LoginOptions): AmiAction =>
    AmiAction.create('Login', {Username: username, Secret: secret, Events: eventMask});

export const logoff = (): AmiAction => AmiAction.create('Logoff');

export const ping = (): AmiAction => AmiAction.create('Ping');

/** Runs a console command; its output arrives on the response's `output`. */
export const command = (line: string): AmiAction => AmiAction.create('Command', {Command: line});

export const coreStatus = (): AmiAction => AmiAction.create('CoreStatus');

/** List action: results arrive as `CoreShowChannel` events. */
export const coreShowChannels = (): AmiAction => AmiAction.create('CoreShowChannels');

/** List action: results arrive as `Status` events. */
export const status = ({channel, variables}: StatusOptions = {}): AmiAction =>
    AmiAction.create('Status', {
        Channel: channel,
        Variables: variables && variables.length > 0 ? variables.join(',') : undefined,
    });

export const getVar = ({variable, channel}: GetVarOptions): AmiAction =>
    AmiAction.create('Getvar', {Channel: channel, Variable: variable});

export const setVar = ({variable, value, channel}: SetVarOptions): AmiAction =>
    AmiAction.create('Setvar', {Channel: channel, Variable: variable, Value: value});

export const hangup = ({channel, cause}: HangupOptions): AmiAction =>
    AmiAction.create('Hangup', {Channel: channel, Cause: cause});

export const originate = (options: OriginateOptions): AmiAction =>
    AmiAction.create('Originate', {
        Channel: options.channel,
        Context: options.context,
        Exten: options.exten,
        Priority: options.priority,
        Application: options.application,
        Data: options.data,
        CallerID: options.callerId,
        Timeout: options.timeoutMs,
        Account: options.account,
        Async: options.async,
        Variable: options.variables
            ? Object.entries(options.variables).map(([name, value]) => `${name}=${value}`)
            : undefined,
    });

export const redirect = ({channel, context, exten, priority, extraChannel}: RedirectOptions): AmiAction =>
    AmiAction.create('Redirect', {
        Channel: channel,
        ExtraChannel: extraChannel,
        Context: context,
        Exten: exten,
        Priority: priority,
    });

/** Changes which event classes this session receives. */
export const events = (mask: AmiEventMask): AmiAction => AmiAction.create('Events', {EventMask: mask});

/** Broadcasts a `UserEvent` to every connected manager session. */
export const userEvent = (name: string, headers: Record<string, string> = {}): AmiAction =>
    AmiAction.create('UserEvent', {UserEvent: name, ...headers});
