import type { AudioSink } from './types';

/**
 * Keeps every participant's decoded audio in memory, one append-only chunk
 * list per speaker. Buffers are created on the first non-empty chunk; once
 * closed, further writes are dropped so a late packet cannot change what
 * gets mixed.
 */
export class ParticipantAudioSink implements AudioSink {
    private readonly buffers = new Map<string, Buffer[]>();
    private readonly byteCounts = new Map<string, number>();
    private _closed: boolean = false;
    private _droppedChunks: number = 0;

    public get closed(): boolean {
        return this._closed;
    }

    public get droppedChunks(): number {
        return this._droppedChunks;
    }

    public write(participantId: string, chunk: Buffer): boolean {
        if (this._closed) {
            this._droppedChunks++;
            return false;
        }
        if (chunk.length === 0) return false;

        let chunks = this.buffers.get(participantId);
        if (!chunks) {
            chunks = [];
            this.buffers.set(participantId, chunks);
        }

        // The decoder may recycle its output buffer, so keep a copy.
        chunks.push(Buffer.from(chunk));
        this.byteCounts.set(participantId, (this.byteCounts.get(participantId) ?? 0) + chunk.length);
        return true;
    }

    public close(): void {
        this._closed = true;
    }

    /** Participants in the order their first chunk arrived. */
    public participantIds(): string[] {
        return Array.from(this.buffers.keys());
    }

    public byteLength(participantId: string): number {
        return this.byteCounts.get(participantId) ?? 0;
    }

    public read(participantId: string): Buffer {
        const chunks = this.buffers.get(participantId);
        return chunks ? Buffer.concat(chunks, this.byteLength(participantId)) : Buffer.alloc(0);
    }
}
