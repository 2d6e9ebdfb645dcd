/**
 * Collects the events a list-style action answers with.
 * @module actions/event-list
 *
 * A list action replies `EventList: start`, then sends one event per item
 * carrying its `ActionID`, and finishes with an event marked
 * `EventList: Complete`.
 */
import type {AmiClient} from '../core/AmiClient';
import {AmiEventListMarker, AmiFieldName} from '../protocol/constants';
import {connectionError} from '../protocol/errors';
import type {AmiAction, AmiEvent, AmiResponse} from '../protocol/message';

export type AmiEventListResult = {
    response: AmiResponse;
    /** Item events followed by the completion event, in arrival order. */
    events: AmiEvent[];
};

const hasMarker = (message: AmiResponse | AmiEvent, marker: AmiEventListMarker): boolean =>
    message.get(AmiFieldName.EventList)?.toLowerCase() === marker.toLowerCase();

/**
 * Queues `action` and resolves once its event list is complete. A response
 * that does not open a list resolves at once with no events.
 */
export const collectEventList = (client: AmiClient, action: AmiAction): Promise<AmiEventListResult> =>
    new Promise<AmiEventListResult>((resolve, reject) => {
        // Events can beat the response; hold them until the id is known.
        const early: AmiEvent[] = [];
        const collected: AmiEvent[] = [];
        let response: AmiResponse | null = null;

        const cleanup = (): void => {
            client.off('event', onEvent);
            client.off('close', onClose);
        };

        const accept = (settled: AmiResponse, event: AmiEvent): boolean => {
            if (event.actionId !== settled.actionId) return false;
            collected.push(event);
            if (!hasMarker(event, AmiEventListMarker.Complete)) return false;
            cleanup();
            resolve({response: settled, events: collected});
            return true;
        };

        const onEvent = (event: AmiEvent): void => {
            if (event.actionId === undefined) return;
            if (response === null) {
                early.push(event);
            } else {
                accept(response, event);
            }
        };

        const onClose = (): void => {
            cleanup();
            reject(connectionError('CONNECTION_CLOSED', {action: action.name}));
        };

        client.on('event', onEvent);
        client.on('close', onClose);

        void client.queue(action).then(
            (settled) => {
                if (settled.actionId === undefined || !hasMarker(settled, AmiEventListMarker.Start)) {
                    cleanup();
                    resolve({response: settled, events: []});
                    return;
                }
                response = settled;
                for (const event of early.splice(0)) {
                    if (accept(settled, event)) return;
                }
            },
            (err: unknown) => {
                cleanup();
                reject(err);
            },
        );
    });
