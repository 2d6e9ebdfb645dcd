/**
 * Stream framing for the manager protocol.
 * @module protocol/decoder
 *
 * Blocks are runs of `Name: Value` lines closed by a blank line. The decoder
 * is fed arbitrary chunks and hands back every block completed by each one.
 */
import {StringDecoder} from 'string_decoder';

import {
    AMI_DEFAULT_MAX_BUFFER_BYTES,
    AMI_END_COMMAND_MARKER,
    AMI_FOLLOWS_HEADER_FIELDS,
    AmiFieldName,
    AmiResponseStatus,
} from './constants';
import {AmiFramingError} from './errors';
import type {AmiField, AmiRawBlock} from './fields';

export type AmiFrameDecoderOptions = {
    /** Cap on the unterminated tail (partial line plus open block), in bytes. */
    maxBufferBytes?: number;
    /** Called with the banner when the first line of the stream has no separator. */
    onGreeting?: (banner: string) => void;
    /** Called for each skipped line that has no `:` separator. */
    onMalformedLine?: (line: string) => void;
    /** Called by {@link AmiFrameDecoder.finish} for a block the stream never closed. */
    onTruncatedBlock?: (fields: AmiRawBlock) => void;
};

/** Splits `Name: Value`; `null` when the line has no usable separator. */
export const parseFieldLine = (line: string): AmiField | null => {
    const separator = line.indexOf(':');
    if (separator <= 0) return null;
    const name = line.slice(0, separator).trim();
    if (name.length === 0) return null;
    let value = line.slice(separator + 1);
    if (value.startsWith(' ')) value = value.slice(1);
    return {name, value};
};

export class AmiFrameDecoder {
    private readonly text = new StringDecoder('utf8');
    private readonly maxBufferBytes: number;
    private readonly options: AmiFrameDecoderOptions;

    private partial = '';
    private fields: AmiField[] = [];
    private blockBytes = 0;
    private firstLine = true;
    private finished = false;

    /** `null` outside command output, else the collected output lines. */
    private output: string[] | null = null;
    private outputClosed = false;

    constructor(options: AmiFrameDecoderOptions = {}) {
        this.options = options;
        this.maxBufferBytes = options.maxBufferBytes ?? AMI_DEFAULT_MAX_BUFFER_BYTES;
        if (!Number.isInteger(this.maxBufferBytes) || this.maxBufferBytes <= 0) {
            throw new RangeError(`maxBufferBytes must be a positive integer, got ${this.maxBufferBytes}`);
        }
    }

    /** Whether {@link finish} has been called. */
    public isFinished(): boolean {
        return this.finished;
    }

    /**
     * Feeds one chunk and returns the blocks it completed, in stream order.
     * Throws {@link AmiFramingError} when the unterminated tail outgrows
     * `maxBufferBytes`; blocks the chunk closed first ride on the error.
     */
    public push(chunk: Buffer | Uint8Array | string): AmiRawBlock[] {
        if (this.finished) {
            throw new Error('AmiFrameDecoder is finished; create a new decoder for a new connection');
        }
        const decoded = typeof chunk === 'string' ? chunk : this.text.write(Buffer.from(chunk));
        const blocks: AmiRawBlock[] = [];

        let data = this.partial + decoded;
        let newline = data.indexOf('\n');
        while (newline !== -1) {
            let line = data.slice(0, newline);
            if (line.endsWith('\r')) line = line.slice(0, -1);
            data = data.slice(newline + 1);
            const block = this.consumeLine(line);
            if (block) blocks.push(block);
            newline = data.indexOf('\n');
        }
        this.partial = data;

        const pending = Buffer.byteLength(this.partial) + this.blockBytes;
        if (pending > this.maxBufferBytes) {
            throw new AmiFramingError(
                `Manager stream buffer exceeded ${this.maxBufferBytes} bytes without a block terminator`,
                blocks,
                {bufferedBytes: pending},
            );
        }
        return blocks;
    }

    /**
     * Marks the end of the stream. An unclosed block is reported and
     * dropped; later calls to {@link push} throw.
     */
    public finish(): void {
        if (this.finished) return;
        this.finished = true;
        const rest = this.partial + this.text.end();
        this.partial = '';
        if (rest.length > 0) {
            const field = parseFieldLine(rest.endsWith('\r') ? rest.slice(0, -1) : rest);
            if (field) this.fields.push(field);
        }
        const open = this.closeBlock();
        if (open) this.options.onTruncatedBlock?.(open);
    }

    private consumeLine(line: string): AmiRawBlock | null {
        const isFirstLine = this.firstLine;
        this.firstLine = false;

        if (this.output !== null && !this.outputClosed) {
            if (line === AMI_END_COMMAND_MARKER) {
                this.outputClosed = true;
            } else {
                this.output.push(line);
                this.blockBytes += Buffer.byteLength(line) + 1;
            }
            return null;
        }

        // Past its headers, every line of a Follows block is output, blank or not.
        if (this.output === null && this.isFollowsBlock() && !this.isFollowsHeader(line)) {
            this.output = line === AMI_END_COMMAND_MARKER ? [] : [line];
            this.outputClosed = line === AMI_END_COMMAND_MARKER;
            this.blockBytes += Buffer.byteLength(line) + 1;
            return null;
        }

        if (line.length === 0) {
            return this.closeBlock();
        }

        const field = parseFieldLine(line);
        if (field) {
            this.fields.push(field);
            this.blockBytes += Buffer.byteLength(line) + 2;
            return null;
        }

        if (isFirstLine) {
            this.options.onGreeting?.(line);
        } else {
            this.options.onMalformedLine?.(line);
        }
        return null;
    }

    private isFollowsBlock(): boolean {
        const first = this.fields[0];
        return first !== undefined
            && first.name.toLowerCase() === AmiFieldName.Response.toLowerCase()
            && first.value.toLowerCase() === AmiResponseStatus.Follows.toLowerCase();
    }

    /** A header name not yet seen in this block; anything else opens the output. */
    private isFollowsHeader(line: string): boolean {
        const field = parseFieldLine(line);
        if (field === null) return false;
        const name = field.name.toLowerCase();
        return AMI_FOLLOWS_HEADER_FIELDS.has(name)
            && !this.fields.some((existing) => existing.name.toLowerCase() === name);
    }

    private closeBlock(): AmiRawBlock | null {
        const fields = this.fields;
        if (this.output !== null && this.output.length > 0) {
            fields.push({name: AmiFieldName.Output, value: this.output.join('\n')});
        }
        this.fields = [];
        this.output = null;
        this.outputClosed = false;
        this.blockBytes = 0;
        return fields.length > 0 ? fields : null;
    }
}

/**
 * Lazily decodes a connection's byte stream into raw blocks.
 *
 * The sequence ends with the source. It cannot be restarted: each connection
 * needs its own call.
 */
export async function* decodeFrames(
    source: AsyncIterable<Buffer | Uint8Array | string>,
    options: AmiFrameDecoderOptions = {},
): AsyncGenerator<AmiRawBlock, void, undefined> {
    const decoder = new AmiFrameDecoder(options);
    for await (const chunk of source) {
        yield* decoder.push(chunk);
    }
    decoder.finish();
}
