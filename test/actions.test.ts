import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

import {
    AmiAction,
    AmiActions,
    AmiClient,
    collectEventList,
    command,
    coreShowChannels,
    events,
    getVar,
    hangup,
    login,
    originate,
    queueWithTimeout,
    redirect,
    setVar,
    status,
    userEvent,
    withTimeout,
} from '../src';
import {createLogger, MockSocket} from './support/mock-socket';

describe('action builders', () => {
    it('serializes login with an optional event mask', () => {
        expect(login({username: 'admin', secret: 'test-secret'}).serialize())
            .toBe('Action: Login\r\nUsername: admin\r\nSecret: test-secret\r\n\r\n');
        expect(login({username: 'admin', secret: 'test-secret', events: 'call,system'}).serialize())
            .toBe('Action: Login\r\nUsername: admin\r\nSecret: test-secret\r\nEvents: call,system\r\n\r\n');
    });

    it('serializes originate in field order with one Variable per entry', () => {
        const action = originate({
            channel: 'PJSIP/100',
            context: 'default',
            exten: '200',
            priority: 1,
            callerId: 'Desk <100>',
            timeoutMs: 30000,
            async: true,
            variables: {FOO: '1', BAR: 'two'},
        });

        expect(action.serialize()).toBe(
            'Action: Originate\r\nChannel: PJSIP/100\r\nContext: default\r\nExten: 200\r\nPriority: 1\r\n'
            + 'CallerID: Desk <100>\r\nTimeout: 30000\r\nAsync: true\r\n'
            + 'Variable: FOO=1\r\nVariable: BAR=two\r\n\r\n',
        );
    });

    it('omits fields that were not given', () => {
        expect(status().serialize()).toBe('Action: Status\r\n\r\n');
        expect(status({channel: 'PJSIP/100-1', variables: ['A', 'B']}).serialize())
            .toBe('Action: Status\r\nChannel: PJSIP/100-1\r\nVariables: A,B\r\n\r\n');
        expect(getVar({variable: 'GLOBAL_X'}).serialize()).toBe('Action: Getvar\r\nVariable: GLOBAL_X\r\n\r\n');
        expect(hangup({channel: 'PJSIP/100-1'}).serialize()).toBe('Action: Hangup\r\nChannel: PJSIP/100-1\r\n\r\n');
    });

    it('serializes the remaining builders', () => {
        expect(command('core show uptime').serialize()).toBe('Action: Command\r\nCommand: core show uptime\r\n\r\n');
        expect(setVar({channel: 'PJSIP/1', variable: 'X', value: ''}).serialize())
            .toBe('Action: Setvar\r\nChannel: PJSIP/1\r\nVariable: X\r\nValue: \r\n\r\n');
        expect(hangup({channel: 'PJSIP/1', cause: 16}).fields.get('Cause')).toBe('16');
        expect(redirect({channel: 'PJSIP/1', extraChannel: 'PJSIP/2', context: 'park', exten: '700', priority: 1})
            .fields.names()).toEqual(['Action', 'Channel', 'ExtraChannel', 'Context', 'Exten', 'Priority']);
        expect(events('off').serialize()).toBe('Action: Events\r\nEventMask: off\r\n\r\n');
        expect(userEvent('Deploy', {Version: '3'}).serialize())
            .toBe('Action: UserEvent\r\nUserEvent: Deploy\r\nVersion: 3\r\n\r\n');
        expect(coreShowChannels().name).toBe('CoreShowChannels');
    });

    it('refuses values that would break framing', () => {
        expect(() => command('core show uptime\r\nAction: Logoff')).toThrow(RangeError);
    });
});

describe('collectEventList', () => {
    let socket: MockSocket;
    let client: AmiClient;

    beforeEach(() => {
        socket = new MockSocket();
        client = new AmiClient(socket, {actionIdPrefix: 'l-', logger: createLogger()});
    });

    it('gathers item events up to the completion event', async () => {
        const result = collectEventList(client, coreShowChannels());
        socket.feed([
            'Response: Success\r\nActionID: l-1\r\nEventList: start\r\nMessage: Channels will follow\r\n\r\n',
            'Event: CoreShowChannel\r\nActionID: l-1\r\nChannel: PJSIP/100-1\r\n\r\n',
            'Event: Newexten\r\nChannel: PJSIP/300-9\r\n\r\n',
            'Event: CoreShowChannel\r\nActionID: other\r\nChannel: PJSIP/999-1\r\n\r\n',
            'Event: CoreShowChannel\r\nActionID: l-1\r\nChannel: PJSIP/200-2\r\n\r\n',
            'Event: CoreShowChannelsComplete\r\nActionID: l-1\r\nEventList: Complete\r\nListItems: 2\r\n\r\n',
        ].join(''));

        const {response, events: listed} = await result;
        expect(response.message).toBe('Channels will follow');
        expect(listed.map((event) => event.name)).toEqual([
            'CoreShowChannel',
            'CoreShowChannel',
            'CoreShowChannelsComplete',
        ]);
        expect(listed.map((event) => event.get('Channel'))).toEqual(['PJSIP/100-1', 'PJSIP/200-2', undefined]);
        expect(client.listenerCount('event')).toBe(0);
        expect(client.listenerCount('close')).toBe(0);
    });

    it('collects events delivered after the response was handled', async () => {
        const result = collectEventList(client, status());
        socket.feed('Response: Success\r\nActionID: l-1\r\nEventList: start\r\n\r\n');
        await Promise.resolve();
        socket.feed('Event: Status\r\nActionID: l-1\r\nChannel: PJSIP/1\r\n\r\n');
        socket.feed('Event: StatusComplete\r\nActionID: l-1\r\nEventList: Complete\r\n\r\n');

        const {events: listed} = await result;
        expect(listed.map((event) => event.name)).toEqual(['Status', 'StatusComplete']);
    });

    it('resolves with no events when the response opens no list', async () => {
        const result = collectEventList(client, coreShowChannels());
        socket.feed('Response: Success\r\nActionID: l-1\r\n\r\n');

        await expect(result).resolves.toMatchObject({events: []});
        expect(client.listenerCount('event')).toBe(0);
    });

    it('rejects with the response error when the action fails', async () => {
        const result = collectEventList(client, status());
        socket.feed('Response: Error\r\nActionID: l-1\r\nMessage: No such channel\r\n\r\n');

        await expect(result).rejects.toMatchObject({code: 'ACTION_FAILED', message: 'No such channel'});
    });

    it('rejects when the connection closes mid-list', async () => {
        const result = collectEventList(client, coreShowChannels());
        socket.feed('Response: Success\r\nActionID: l-1\r\nEventList: start\r\n\r\n');
        await Promise.resolve();
        client.close();

        await expect(result).rejects.toMatchObject({code: 'CONNECTION_CLOSED'});
        expect(client.listenerCount('event')).toBe(0);
    });
});

describe('AmiActions', () => {
    let socket: MockSocket;
    let actions: AmiActions;

    beforeEach(() => {
        socket = new MockSocket();
        actions = new AmiActions(new AmiClient(socket, {actionIdPrefix: 'a-', logger: createLogger()}));
    });

    it('returns command output lines', async () => {
        const output = actions.command('core show uptime');
        expect(socket.writes).toEqual(['Action: Command\r\nActionID: a-1\r\nCommand: core show uptime\r\n\r\n']);
        socket.feed('Response: Follows\r\nActionID: a-1\r\nUptime 5 minutes\r\nLast reload: 1 minute\r\n'
            + '--END COMMAND--\r\n\r\n');

        await expect(output).resolves.toEqual(['Uptime 5 minutes', 'Last reload: 1 minute']);
    });

    it('keeps output lines that look like fields', async () => {
        const output = actions.command('core show uptime');
        socket.feed('Response: Follows\r\nPrivilege: Command\r\nActionID: a-1\r\n'
            + 'System uptime: 2 hours, 5 minutes\r\nLast reload: 1 hour\r\n--END COMMAND--\r\n\r\n');

        await expect(output).resolves.toEqual(['System uptime: 2 hours, 5 minutes', 'Last reload: 1 hour']);
    });

    it('keeps a leading blank output line', async () => {
        const output = actions.command('dialplan show');
        socket.feed('Response: Follows\r\nActionID: a-1\r\n\r\nsome output\r\n--END COMMAND--\r\n\r\n');

        await expect(output).resolves.toEqual(['', 'some output']);
    });

    it('reads a variable value', async () => {
        const value = actions.getVar({variable: 'DIALSTATUS', channel: 'PJSIP/1'});
        socket.feed('Response: Success\r\nActionID: a-1\r\nVariable: DIALSTATUS\r\nValue: ANSWER\r\n\r\n');

        await expect(value).resolves.toBe('ANSWER');
    });

    it('keeps only item events from channel listings', async () => {
        const channels = actions.coreShowChannels();
        socket.feed([
            'Response: Success\r\nActionID: a-1\r\nEventList: start\r\n\r\n',
            'Event: CoreShowChannel\r\nActionID: a-1\r\nChannel: PJSIP/7\r\n\r\n',
            'Event: CoreShowChannelsComplete\r\nActionID: a-1\r\nEventList: Complete\r\n\r\n',
        ].join(''));

        const listed = await channels;
        expect(listed.map((event) => event.get('Channel'))).toEqual(['PJSIP/7']);
    });

    it('sends ping and resolves with the response', async () => {
        const pong = actions.ping();
        socket.feed('Response: Success\r\nActionID: a-1\r\nPing: Pong\r\n\r\n');

        expect((await pong).get('Ping')).toBe('Pong');
    });
});

describe('timeouts', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('rejects with RESPONSE_TIMEOUT and leaves the request pending', async () => {
        const socket = new MockSocket();
        const client = new AmiClient(socket, {actionIdPrefix: 'w-', logger: createLogger()});
        const result = queueWithTimeout(client, AmiAction.create('Ping'), 500);
        const outcome = expect(result).rejects.toMatchObject({
            code: 'RESPONSE_TIMEOUT',
            domain: 'timeout',
            details: {action: 'Ping'},
        });

        await vi.advanceTimersByTimeAsync(500);
        await outcome;
        expect(client.pendingCount).toBe(1);
    });

    it('passes the response through when it arrives in time', async () => {
        const socket = new MockSocket();
        const client = new AmiClient(socket, {actionIdPrefix: 'w-', logger: createLogger()});
        const result = queueWithTimeout(client, AmiAction.create('Ping'), 500);
        socket.feed('Response: Success\r\nActionID: w-1\r\n\r\n');

        await expect(result).resolves.toMatchObject({status: 'Success'});
    });

    it('refuses a non-positive deadline', async () => {
        await expect(withTimeout(Promise.resolve(1), 0)).rejects.toThrow(RangeError);
    });
});
