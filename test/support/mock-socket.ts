import {EventEmitter} from 'events';
import {vi} from 'vitest';

import type {AmiLogger} from '../../src';

/** In-process stand-in for a connected `net.Socket`. */
export class MockSocket extends EventEmitter {
    public writes: string[] = [];
    public ended = false;
    public destroyed = false;
    public writeError: Error | null = null;

    public write(chunk: string, cb?: (err?: Error | null) => void): boolean {
        this.writes.push(chunk);
        cb?.(this.writeError);
        return this.writeError === null;
    }

    public end(): void {
        this.ended = true;
        this.destroyed = true;
        this.emit('close', false);
    }

    public destroy(error?: Error): this {
        this.destroyed = true;
        if (error) this.emit('error', error);
        this.emit('close', !!error);
        return this;
    }

    /** Delivers server bytes to whoever reads this socket. */
    public feed(text: string): void {
        this.emit('data', Buffer.from(text, 'utf8'));
    }
}

export type MockLogger = AmiLogger & {
    debug: ReturnType<typeof vi.fn>;
    warn: ReturnType<typeof vi.fn>;
};

export const createLogger = (): MockLogger => ({
    debug: vi.fn(),
    warn: vi.fn(),
});
