/**
 * Ordered multi-valued field set with case-insensitive names.
 * @module protocol/fields
 */

export type AmiField = {
    readonly name: string;
    readonly value: string;
};

/** A field as accepted by constructors: object form or `[name, value]` tuple. */
export type AmiFieldInput = AmiField | readonly [name: string, value: string];

/** One decoded wire block before classification. */
export type AmiRawBlock = readonly AmiField[];

const toField = (input: AmiFieldInput): AmiField => {
    if ('name' in input) {
        return Object.freeze({name: input.name, value: input.value});
    }
    const [name, value] = input;
    return Object.freeze({name, value});
};

/**
 * Immutable ordered list of `(name, value)` pairs.
 *
 * Names may repeat. Iteration and serialization keep insertion order, while
 * every lookup ignores case.
 */
export class AmiFieldSet implements Iterable<AmiField> {
    private readonly list: readonly AmiField[];
    private readonly index: ReadonlyMap<string, readonly string[]>;
    private readonly displayNames: readonly string[];

    constructor(fields: Iterable<AmiFieldInput> = []) {
        const list: AmiField[] = [];
        const index = new Map<string, string[]>();
        const displayNames: string[] = [];
        for (const input of fields) {
            const field = toField(input);
            list.push(field);
            const key = field.name.toLowerCase();
            const values = index.get(key);
            if (values) {
                values.push(field.value);
            } else {
                index.set(key, [field.value]);
                displayNames.push(field.name);
            }
        }
        this.list = Object.freeze(list);
        this.index = index;
        this.displayNames = Object.freeze(displayNames);
    }

    /** Number of fields, repeats included. */
    public get size(): number {
        return this.list.length;
    }

    /** First value of `name`, or `undefined` when absent. */
    public get(name: string): string | undefined {
        return this.index.get(name.toLowerCase())?.[0];
    }

    /** Every value of `name` in arrival order. */
    public getAll(name: string): string[] {
        return [...(this.index.get(name.toLowerCase()) ?? [])];
    }

    public has(name: string): boolean {
        return this.index.has(name.toLowerCase());
    }

    /** The full ordered field list. */
    public fields(): readonly AmiField[] {
        return this.list;
    }

    /** Distinct names, each in the casing of its first occurrence. */
    public names(): readonly string[] {
        return this.displayNames;
    }

    /**
     * Plain object view keyed by first-seen casing. Names that repeat map to
     * an array of their values.
     */
    public toRecord(): Record<string, string | string[]> {
        const record: Record<string, string | string[]> = {};
        for (const name of this.displayNames) {
            const values = this.getAll(name);
            record[name] = values.length === 1 ? values[0] : values;
        }
        return record;
    }

    public [Symbol.iterator](): Iterator<AmiField> {
        return this.list[Symbol.iterator]();
    }
}
