import { describe, expect, it } from 'vitest';
import { ParticipantAudioSink } from './ParticipantAudioSink';

describe('ParticipantAudioSink', () => {
    it('keeps chunks per participant in arrival order', () => {
        const sink = new ParticipantAudioSink();

        sink.write('alice', Buffer.from([1, 2]));
        sink.write('bob', Buffer.from([7]));
        sink.write('alice', Buffer.from([3]));

        expect(sink.participantIds()).toEqual(['alice', 'bob']);
        expect([...sink.read('alice')]).toEqual([1, 2, 3]);
        expect(sink.byteLength('alice')).toBe(3);
        expect(sink.byteLength('bob')).toBe(1);
    });

    it('creates no buffer for an empty chunk', () => {
        const sink = new ParticipantAudioSink();

        expect(sink.write('alice', Buffer.alloc(0))).toBe(false);
        expect(sink.participantIds()).toEqual([]);
        expect(sink.read('alice').length).toBe(0);
    });

    it('copies chunks so later mutation does not leak in', () => {
        const sink = new ParticipantAudioSink();
        const chunk = Buffer.from([5, 5]);

        sink.write('alice', chunk);
        chunk.fill(0);

        expect([...sink.read('alice')]).toEqual([5, 5]);
    });

    it('drops writes after close and counts them', () => {
        const sink = new ParticipantAudioSink();
        sink.write('alice', Buffer.from([1]));
        sink.close();

        expect(sink.closed).toBe(true);
        expect(sink.write('alice', Buffer.from([2]))).toBe(false);
        expect(sink.write('carol', Buffer.from([3]))).toBe(false);
        expect(sink.droppedChunks).toBe(2);
        expect([...sink.read('alice')]).toEqual([1]);
        expect(sink.participantIds()).toEqual(['alice']);
    });
});
