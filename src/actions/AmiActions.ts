/**
 * One method per well-known action, queued on a client.
 * @module actions/AmiActions
 */
import type {AmiClient} from '../core/AmiClient';
import type {AmiEvent, AmiResponse} from '../protocol/message';
import {
    type AmiEventMask,
    command,
    coreShowChannels,
    coreStatus,
    events,
    getVar,
    type GetVarOptions,
    hangup,
    type HangupOptions,
    login,
    type LoginOptions,
    logoff,
    originate,
    type OriginateOptions,
    ping,
    redirect,
    type RedirectOptions,
    setVar,
    type SetVarOptions,
    status,
    type StatusOptions,
    userEvent,
} from './builders';
import {collectEventList} from './event-list';

export class AmiActions {
    constructor(private readonly client: AmiClient) {}

    public login(options: LoginOptions): Promise<AmiResponse> {
        return this.client.queue(login(options));
    }

    public logoff(): Promise<AmiResponse> {
        return this.client.queue(logoff());
    }

    public ping(): Promise<AmiResponse> {
        return this.client.queue(ping());
    }

    /** Runs a console command and resolves with its output lines. */
    public async command(line: string): Promise<string[]> {
        const response = await this.client.queue(command(line));
        return response.output;
    }

    public coreStatus(): Promise<AmiResponse> {
        return this.client.queue(coreStatus());
    }

    /** Resolves with one `CoreShowChannel` event per active channel. */
    public async coreShowChannels(): Promise<AmiEvent[]> {
        const {events: listed} = await collectEventList(this.client, coreShowChannels());
        return listed.filter((event) => event.name.toLowerCase() === 'coreshowchannel');
    }

    /** Resolves with one `Status` event per matching channel. */
    public async status(options: StatusOptions = {}): Promise<AmiEvent[]> {
        const {events: listed} = await collectEventList(this.client, status(options));
        return listed.filter((event) => event.name.toLowerCase() === 'status');
    }

    /** Resolves with the variable's value, or `undefined` when unset. */
    public async getVar(options: GetVarOptions): Promise<string | undefined> {
        const response = await this.client.queue(getVar(options));
        return response.get('Value');
    }

    public setVar(options: SetVarOptions): Promise<AmiResponse> {
        return this.client.queue(setVar(options));
    }

    public hangup(options: HangupOptions): Promise<AmiResponse> {
        return this.client.queue(hangup(options));
    }

    public originate(options: OriginateOptions): Promise<AmiResponse> {
        return this.client.queue(originate(options));
    }

    public redirect(options: RedirectOptions): Promise<AmiResponse> {
        return this.client.queue(redirect(options));
    }

    public events(mask: AmiEventMask): Promise<AmiResponse> {
        return this.client.queue(events(mask));
    }

    public userEvent(name: string, headers?: Record<string, string>): Promise<AmiResponse> {
        return this.client.queue(userEvent(name, headers));
    }
}
