import { EventEmitter } from 'events';
import { mkdir, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { Logger } from '../Logger';
import { toError } from '../errors';
import { ParticipantAudioSink } from './ParticipantAudioSink';
import { encodeWav, pcmDurationSeconds } from './audio/wav';
import type {
    AudioFormat,
    Clock,
    Mixer,
    MixInput,
    RecordingEvent,
    RecordingEventData,
    RecordingMetadata,
    SessionState
} from './types';

/** Suffix of the per-participant files written while a session finalizes. */
export const TEMP_FILE_SUFFIX = '.part.wav';

export interface RecordingSessionOptions {
    sessionId: string;
    guildId: string;
    storageDir: string;
    format: AudioFormat;
    initiator?: string;
    now?: Clock;
    logger?: Logger;
}

/**
 * One recording episode. Audio is accepted while the session is `active`;
 * `beginFinalizing` freezes the buffers and `finalize` turns them into a
 * single artifact. Each transition happens once and a session is never
 * restarted.
 */
export class RecordingSession extends EventEmitter {
    public readonly sessionId: string;
    public readonly guildId: string;
    public readonly startedAt: number;

    private state: SessionState = 'active';
    private endedAt?: number;
    private artifactPath: string | null = null;
    private finalizing?: Promise<string | null>;
    private readonly sink = new ParticipantAudioSink();
    private readonly storageDir: string;
    private readonly format: AudioFormat;
    private readonly initiator?: string;
    private readonly now: Clock;
    private readonly logger: Logger;

    constructor(options: RecordingSessionOptions) {
        super();
        this.sessionId = options.sessionId;
        this.guildId = options.guildId;
        this.storageDir = options.storageDir;
        this.format = options.format;
        this.initiator = options.initiator;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? new Logger().child('RecordingSession');
        this.startedAt = this.now();
    }

    /** Buffers a chunk. The sink is closed once finalizing starts, so late chunks are counted and dropped. */
    public handleAudio(participantId: string, chunk: Buffer): boolean {
        return this.sink.write(participantId, chunk);
    }

    public recordPresence(participantId: string, joined: boolean, at: number = this.now()): void {
        if (this.state !== 'active') return;

        const offsetSeconds = (at - this.startedAt) / 1000;
        this.logger.debug(`User ${participantId} ${joined ? 'joined' : 'left'} at ${offsetSeconds.toFixed(2)}s`);
        this.emitEvent(joined ? 'userJoined' : 'userLeft', { userId: participantId, offsetSeconds });
    }

    /** Stops accepting audio. Returns false when the session already left `active`. */
    public beginFinalizing(): boolean {
        if (this.state !== 'active') return false;

        this.state = 'finalizing';
        this.endedAt = this.now();
        this.sink.close();
        return true;
    }

    /**
     * Writes each speaker's audio to a temporary WAV file, hands the files to
     * the mixer and records the artifact path. Resolves to null when nothing
     * was captured or the mixer failed; the session is `complete` either way.
     * Later calls return the first call's result.
     */
    public finalize(mixer: Mixer): Promise<string | null> {
        if (!this.finalizing) {
            this.beginFinalizing();
            this.finalizing = this.processRecording(mixer);
        }
        return this.finalizing;
    }

    private async processRecording(mixer: Mixer): Promise<string | null> {
        const tempFiles: MixInput[] = [];

        try {
            await this.writeTempFiles(tempFiles);

            if (tempFiles.length === 0) {
                this.logger.warn(`No audio data recorded for ${this.sessionId}`);
                return null;
            }

            const outputPath = this.getOutputPath();
            if (tempFiles.length === 1) {
                await mixer.convertSingle(tempFiles[0].path, outputPath);
            } else {
                await mixer.mixMany(tempFiles, this.getDurationSeconds(), outputPath);
            }

            this.artifactPath = outputPath;
            this.logger.info(`Recording session complete: ${outputPath}`);
            return outputPath;
        } catch (error) {
            this.logger.error(`Failed to process recording session ${this.sessionId}:`, error);
            // ffmpeg may have written part of the output before failing.
            await this.removeFile(this.getOutputPath(), 'partial output');
            this.emitEvent('error', { error: toError(error) });
            return null;
        } finally {
            await this.removeTempFiles(tempFiles);
            this.state = 'complete';
            this.emitEvent('stop');
        }
    }

    private async writeTempFiles(written: MixInput[]): Promise<void> {
        const participants = this.sink.participantIds().filter(id => this.sink.byteLength(id) > 0);
        if (participants.length === 0) return;

        await mkdir(this.storageDir, { recursive: true });

        for (const participantId of participants) {
            const pcm = this.sink.read(participantId);
            const tempPath = this.getTempPath(participantId);
            await writeFile(tempPath, encodeWav(pcm));
            written.push({ path: tempPath, startOffsetSeconds: 0 });
            this.logger.debug(`Saved ${pcmDurationSeconds(pcm.length).toFixed(2)}s of audio for user ${participantId}: ${tempPath}`);
        }
    }

    private async removeTempFiles(tempFiles: MixInput[]): Promise<void> {
        for (const { path } of tempFiles) {
            await this.removeFile(path, 'temporary file');
        }
    }

    private async removeFile(path: string, description: string): Promise<void> {
        try {
            await unlink(path);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
            this.logger.warn(`Could not delete ${description} ${path}: ${toError(error).message}`);
        }
    }

    /**
     * Ids made of letters, digits and `-` are used as they are; anything else
     * is base64url encoded behind a leading `_`, so two participants never
     * share a file.
     */
    public getTempPath(participantId: string): string {
        const fileId = /^[A-Za-z0-9-]+$/.test(participantId)
            ? participantId
            : `_${Buffer.from(participantId, 'utf8').toString('base64url')}`;
        return join(this.storageDir, `${this.sessionId}_user_${fileId}${TEMP_FILE_SUFFIX}`);
    }

    public getOutputPath(): string {
        return join(this.storageDir, `${this.sessionId}.${this.format}`);
    }

    public getDurationSeconds(): number {
        return ((this.endedAt ?? this.now()) - this.startedAt) / 1000;
    }

    public getState(): SessionState {
        return this.state;
    }

    public isActive(): boolean {
        return this.state === 'active';
    }

    public getArtifactPath(): string | null {
        return this.artifactPath;
    }

    public getDroppedChunks(): number {
        return this.sink.droppedChunks;
    }

    public getMetadata(): RecordingMetadata {
        return {
            sessionId: this.sessionId,
            guildId: this.guildId,
            state: this.state,
            startTime: new Date(this.startedAt),
            endTime: this.endedAt === undefined ? undefined : new Date(this.endedAt),
            participants: this.sink.participantIds(),
            initiator: this.initiator,
            outputPath: this.artifactPath ?? undefined
        };
    }

    public emitEvent(event: RecordingEvent, data: RecordingEventData = {}): void {
        this.emit('recordingEvent', event, { ...data, metadata: this.getMetadata() });
    }
}
