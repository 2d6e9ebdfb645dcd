/**
 * Manager protocol (AMI) constants.
 * @module protocol/constants
 */
export const AMI_DEFAULT_PORT = 5038;
export const AMI_DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const AMI_DEFAULT_MAX_BUFFER_BYTES = 1024 * 1024;
export const AMI_LINE_ENDING = '\r\n';

/** Marker line closing the output of a `Response: Follows` block. */
export const AMI_END_COMMAND_MARKER = '--END COMMAND--';

/** Well-known field names. Lookups are case-insensitive. */
export enum AmiFieldName {
    Action = 'Action',
    ActionId = 'ActionID',
    Response = 'Response',
    Event = 'Event',
    Message = 'Message',
    Privilege = 'Privilege',
    Output = 'Output',
    EventList = 'EventList',
}

/**
 * Header fields a `Response: Follows` block may carry before its output
 * starts (compared lowercased). Any other line opens the output.
 */
export const AMI_FOLLOWS_HEADER_FIELDS: ReadonlySet<string> = new Set(['response', 'privilege', 'actionid', 'message']);

/** Values of the `Response` field the protocol defines. */
export enum AmiResponseStatus {
    Success = 'Success',
    Error = 'Error',
    Follows = 'Follows',
    Goodbye = 'Goodbye',
}

/** `Response` values that mark a request as failed (compared lowercased). */
export const AMI_FAILURE_STATUSES: ReadonlySet<string> = new Set(['error']);

/** Values of the `EventList` field bracketing list-style results. */
export enum AmiEventListMarker {
    Start = 'start',
    Complete = 'Complete',
}
