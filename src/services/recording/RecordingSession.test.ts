import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '../Logger';
import { RecordingSession } from './RecordingSession';
import { FakeMixer } from './testing';
import type { RecordingEvent, RecordingEventData } from './types';

describe('RecordingSession', () => {
    let storageDir: string;
    let clock: number;

    beforeEach(async () => {
        storageDir = await mkdtemp(join(tmpdir(), 'voxtape-session-'));
        clock = 1_000_000;
    });

    afterEach(async () => {
        await rm(storageDir, { recursive: true, force: true });
    });

    function createSession(sessionId = 'recording_42_test'): RecordingSession {
        return new RecordingSession({
            sessionId,
            guildId: '42',
            storageDir,
            format: 'mp3',
            initiator: 'owner',
            now: () => clock,
            logger: new Logger('error')
        });
    }

    it('accepts audio only while active', () => {
        const session = createSession();

        expect(session.handleAudio('7', Buffer.alloc(4, 1))).toBe(true);
        expect(session.beginFinalizing()).toBe(true);
        expect(session.handleAudio('7', Buffer.alloc(4, 1))).toBe(false);
        expect(session.beginFinalizing()).toBe(false);
        expect(session.getState()).toBe('finalizing');
        expect(session.getDroppedChunks()).toBe(1);
    });

    it('completes without an artifact when nothing was captured', async () => {
        const session = createSession();
        const mixer = new FakeMixer();

        await expect(session.finalize(mixer)).resolves.toBeNull();

        expect(session.getState()).toBe('complete');
        expect(session.getArtifactPath()).toBeNull();
        expect(mixer.singleCalls).toHaveLength(0);
        expect(mixer.manyCalls).toHaveLength(0);
    });

    it('converts a single speaker and removes the temporary file', async () => {
        const session = createSession();
        const mixer = new FakeMixer();
        session.handleAudio('7', Buffer.alloc(960, 1));

        const artifact = await session.finalize(mixer);

        expect(artifact).toBe(join(storageDir, 'recording_42_test.mp3'));
        expect(mixer.singleCalls).toEqual([{
            inputPath: join(storageDir, 'recording_42_test_user_7.part.wav'),
            outputPath: artifact,
            inputExisted: true
        }]);
        expect(await readdir(storageDir)).toEqual(['recording_42_test.mp3']);
    });

    it('mixes several speakers over the session duration', async () => {
        const session = createSession();
        const mixer = new FakeMixer();
        session.handleAudio('7', Buffer.alloc(16, 1));
        session.handleAudio('8', Buffer.alloc(16, 2));
        clock += 4_500;

        await session.finalize(mixer);

        expect(mixer.manyCalls).toHaveLength(1);
        expect(mixer.manyCalls[0].totalDuration).toBe(4.5);
        expect(mixer.manyCalls[0].inputsExisted).toBe(true);
        expect(mixer.manyCalls[0].inputs).toEqual([
            { path: join(storageDir, 'recording_42_test_user_7.part.wav'), startOffsetSeconds: 0 },
            { path: join(storageDir, 'recording_42_test_user_8.part.wav'), startOffsetSeconds: 0 }
        ]);
    });

    it('keeps the session complete and cleans up when mixing fails', async () => {
        const session = createSession();
        const mixer = new FakeMixer();
        mixer.failWith = new Error('ffmpeg exploded');
        const events: Array<{ event: RecordingEvent; data?: RecordingEventData }> = [];
        session.on('recordingEvent', (event: RecordingEvent, data?: RecordingEventData) => events.push({ event, data }));
        session.handleAudio('7', Buffer.alloc(8, 1));

        await expect(session.finalize(mixer)).resolves.toBeNull();

        expect(session.getState()).toBe('complete');
        expect(await readdir(storageDir)).toEqual([]);
        expect(events.map(e => e.event)).toEqual(['error', 'stop']);
        expect(events[0].data?.error?.message).toBe('ffmpeg exploded');
    });

    it('finalizes once however often it is asked', async () => {
        const session = createSession();
        const mixer = new FakeMixer();
        session.handleAudio('7', Buffer.alloc(8, 1));

        const [first, second] = await Promise.all([session.finalize(mixer), session.finalize(mixer)]);

        expect(first).toBe(second);
        expect(mixer.singleCalls).toHaveLength(1);
    });

    it('deletes a partial artifact left behind by a failed mix', async () => {
        const session = createSession();
        const mixer = new FakeMixer();
        mixer.failWith = new Error('ffmpeg exited with code 1');
        mixer.writeBeforeFailing = true;
        session.handleAudio('7', Buffer.alloc(8, 1));
        session.handleAudio('8', Buffer.alloc(8, 2));

        await expect(session.finalize(mixer)).resolves.toBeNull();

        expect(mixer.manyCalls).toHaveLength(1);
        expect(existsSync(session.getOutputPath())).toBe(false);
        expect(await readdir(storageDir)).toEqual([]);
        expect(session.getMetadata().outputPath).toBeUndefined();
    });

    it('encodes participant ids that are not plain file names', () => {
        const session = createSession();

        expect(session.getTempPath('123456789')).toBe(join(storageDir, 'recording_42_test_user_123456789.part.wav'));
        expect(session.getTempPath('../evil id')).toBe(join(storageDir, 'recording_42_test_user__Li4vZXZpbCBpZA.part.wav'));
    });

    it('writes one temporary file per participant even when ids look alike', async () => {
        const session = createSession();
        const mixer = new FakeMixer();
        session.handleAudio('a.b', Buffer.alloc(8, 1));
        session.handleAudio('a_b', Buffer.alloc(8, 2));
        session.handleAudio('a-b', Buffer.alloc(8, 3));

        await session.finalize(mixer);

        const paths = mixer.manyCalls[0].inputs.map(input => input.path);
        expect(new Set(paths).size).toBe(3);
        expect(mixer.manyCalls[0].inputsExisted).toBe(true);
        expect(await readdir(storageDir)).toEqual(['recording_42_test.mp3']);
    });

    it('reports presence with the offset from the session start', () => {
        const session = createSession();
        const events: Array<{ event: RecordingEvent; data?: RecordingEventData }> = [];
        session.on('recordingEvent', (event: RecordingEvent, data?: RecordingEventData) => events.push({ event, data }));

        session.recordPresence('9', true, clock + 2_500);
        session.recordPresence('9', false, clock + 3_000);

        expect(events.map(e => [e.event, e.data?.userId, e.data?.offsetSeconds])).toEqual([
            ['userJoined', '9', 2.5],
            ['userLeft', '9', 3]
        ]);
    });

    it('describes itself in its metadata', async () => {
        const session = createSession();
        session.handleAudio('7', Buffer.alloc(8, 1));
        clock += 1_000;

        await session.finalize(new FakeMixer());

        expect(session.getMetadata()).toEqual({
            sessionId: 'recording_42_test',
            guildId: '42',
            state: 'complete',
            startTime: new Date(1_000_000),
            endTime: new Date(1_001_000),
            participants: ['7'],
            initiator: 'owner',
            outputPath: join(storageDir, 'recording_42_test.mp3')
        });
        expect(existsSync(join(storageDir, 'recording_42_test.mp3'))).toBe(true);
    });
});
