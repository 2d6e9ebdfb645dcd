/**
 * Typed manager protocol messages: outgoing actions, incoming responses and events.
 * @module protocol/message
 */
import {AMI_FAILURE_STATUSES, AMI_LINE_ENDING, AmiFieldName} from './constants';
import {type AmiField, type AmiFieldInput, AmiFieldSet} from './fields';

export type AmiMessageKind = 'action' | 'response' | 'event';

/** Values accepted by {@link AmiAction.create}. Arrays become repeated fields. */
export type AmiActionFieldValue = string | number | boolean | readonly string[] | undefined;

const INVALID_NAME = /[:\r\n]/;
const INVALID_VALUE = /[\r\n]/;

const assertWritableField = ({name, value}: AmiField): void => {
    if (name.length === 0 || name.trim() !== name || INVALID_NAME.test(name)) {
        throw new RangeError(`Invalid field name ${JSON.stringify(name)}`);
    }
    if (INVALID_VALUE.test(value)) {
        throw new RangeError(`Field "${name}" value must not contain line breaks`);
    }
};

/** Renders fields as one wire block: `Name: Value` lines and a closing blank line. */
export const serializeFields = (fields: Iterable<AmiField>): string => {
    let out = '';
    for (const {name, value} of fields) {
        out += `${name}: ${value}${AMI_LINE_ENDING}`;
    }
    return out + AMI_LINE_ENDING;
};

export abstract class AmiMessage {
    public abstract readonly kind: AmiMessageKind;
    public readonly fields: AmiFieldSet;

    protected constructor(fields: AmiFieldSet | Iterable<AmiFieldInput>) {
        this.fields = fields instanceof AmiFieldSet ? fields : new AmiFieldSet(fields);
    }

    /** Correlation id carried in `ActionID`, if any. */
    public get actionId(): string | undefined {
        return this.fields.get(AmiFieldName.ActionId);
    }

    public get(name: string): string | undefined {
        return this.fields.get(name);
    }

    public getAll(name: string): string[] {
        return this.fields.getAll(name);
    }
}

/** Outgoing command. Always carries an `Action` field. */
export class AmiAction extends AmiMessage {
    public readonly kind = 'action';

    constructor(fields: AmiFieldSet | Iterable<AmiFieldInput>) {
        super(fields);
        for (const field of this.fields) assertWritableField(field);
        const name = this.fields.get(AmiFieldName.Action);
        if (name === undefined || name.trim().length === 0) {
            throw new RangeError('Action messages require a non-empty "Action" field');
        }
    }

    /**
     * Builds an action from its name and a record of fields.
     * `undefined` values are skipped; arrays emit one field per element.
     */
    public static create(name: string, fields: Record<string, AmiActionFieldValue> = {}): AmiAction {
        const list: AmiField[] = [{name: AmiFieldName.Action, value: name}];
        for (const [key, value] of Object.entries(fields)) {
            if (value === undefined) continue;
            if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                list.push({name: key, value: String(value)});
            } else {
                for (const item of value) list.push({name: key, value: item});
            }
        }
        return new AmiAction(list);
    }

    /** Value of the `Action` field. */
    public get name(): string {
        return this.fields.get(AmiFieldName.Action) ?? '';
    }

    /**
     * Returns a copy whose `ActionID` is `id`. The id goes right after the
     * `Action` field; any previous `ActionID` fields are dropped.
     */
    public withActionId(id: string): AmiAction {
        const next: AmiField[] = [];
        let placed = false;
        for (const field of this.fields) {
            if (field.name.toLowerCase() === 'actionid') continue;
            next.push(field);
            if (!placed && field.name.toLowerCase() === 'action') {
                next.push({name: AmiFieldName.ActionId, value: id});
                placed = true;
            }
        }
        return new AmiAction(next);
    }

    /** Wire text for this action. */
    public serialize(): string {
        return serializeFields(this.fields);
    }
}

/** Incoming reply to an action, tagged by its `Response` field. */
export class AmiResponse extends AmiMessage {
    public readonly kind = 'response';

    constructor(fields: AmiFieldSet | Iterable<AmiFieldInput>) {
        super(fields);
    }

    /** Value of `Response`, e.g. `Success`, `Error` or `Follows`. */
    public get status(): string {
        return this.fields.get(AmiFieldName.Response) ?? '';
    }

    public get message(): string | undefined {
        return this.fields.get(AmiFieldName.Message);
    }

    public isError(): boolean {
        return AMI_FAILURE_STATUSES.has(this.status.toLowerCase());
    }

    /** Command output, one entry per line, whichever way the server framed it. */
    public get output(): string[] {
        return this.fields.getAll(AmiFieldName.Output).flatMap((value) => value.split('\n'));
    }
}

/** Unsolicited notification, tagged by its `Event` field. */
export class AmiEvent extends AmiMessage {
    public readonly kind = 'event';

    constructor(fields: AmiFieldSet | Iterable<AmiFieldInput>) {
        super(fields);
    }

    /** Event type, the value of `Event`. */
    public get name(): string {
        return this.fields.get(AmiFieldName.Event) ?? '';
    }
}

export type AmiIncomingMessage = AmiResponse | AmiEvent;
