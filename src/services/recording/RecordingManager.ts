import { mkdirSync } from 'fs';
import { readdir, stat } from 'fs/promises';
import { extname, join } from 'path';
import { Logger } from '../Logger';
import { AlreadyRecordingError, CaptureBackendError, NotRecordingError } from '../errors';
import { RecordingSession, TEMP_FILE_SUFFIX } from './RecordingSession';
import { createRecordingEventLogger } from './RecordingEventLogger';
import { AUDIO_FORMATS } from './types';
import type {
    AudioFormat,
    CaptureHandle,
    Clock,
    Mixer,
    RecordingEvent,
    RecordingEventData,
    RecordingEventHandler
} from './types';

export interface RecordingManagerOptions {
    storageDir: string;
    format: AudioFormat;
    mixer: Mixer;
    logger?: Logger;
    now?: Clock;
    /** How long `stopRecording` waits for the capture backend to drain before finalizing anyway. */
    captureStopTimeoutMs?: number;
}

interface ActiveRecording {
    session: RecordingSession;
    capture: CaptureHandle;
    captureStopped: Promise<void>;
    completion?: Promise<string | null>;
}

const DEFAULT_CAPTURE_STOP_TIMEOUT_MS = 10_000;

/**
 * Owns the process-wide recording slot: at most one session exists at a
 * time, across every guild. The slot is claimed before the first await in
 * `startRecording`, so concurrent callers see `AlreadyRecordingError`.
 */
export class RecordingManager {
    private active: ActiveRecording | null = null;
    private readonly globalEventHandlers = new Set<RecordingEventHandler>();
    private eventLogger?: RecordingEventHandler;
    private readonly storageDir: string;
    private readonly format: AudioFormat;
    private readonly mixer: Mixer;
    private readonly now: Clock;
    private readonly captureStopTimeoutMs: number;
    private logger: Logger;
    /** Ids handed out within the current millisecond, keyed by their unsuffixed form. */
    private sessionSequences = new Map<string, number>();
    private sequenceTimestamp?: string;

    constructor(options: RecordingManagerOptions) {
        this.storageDir = options.storageDir;
        this.format = options.format;
        this.mixer = options.mixer;
        this.now = options.now ?? Date.now;
        this.captureStopTimeoutMs = options.captureStopTimeoutMs ?? DEFAULT_CAPTURE_STOP_TIMEOUT_MS;
        this.logger = (options.logger ?? new Logger()).child('RecordingManager');

        mkdirSync(this.storageDir, { recursive: true });
    }

    public addGlobalEventHandler(handler: RecordingEventHandler): void {
        this.globalEventHandlers.add(handler);
    }

    public removeGlobalEventHandler(handler: RecordingEventHandler): void {
        this.globalEventHandlers.delete(handler);
    }

    public setLogger(logger: Logger): void {
        if (this.eventLogger) {
            this.globalEventHandlers.delete(this.eventLogger);
        }
        this.logger = logger.child('RecordingManager');
        this.eventLogger = createRecordingEventLogger(logger);
        this.globalEventHandlers.add(this.eventLogger);
    }

    public async startRecording(guildId: string, capture: CaptureHandle, initiatorId?: string): Promise<string> {
        if (this.active) {
            throw new AlreadyRecordingError(this.active.session.guildId);
        }

        const session = new RecordingSession({
            sessionId: this.createSessionId(guildId),
            guildId,
            storageDir: this.storageDir,
            format: this.format,
            initiator: initiatorId,
            now: this.now,
            logger: this.logger.child('RecordingSession')
        });
        this.forwardEvents(session);

        let signalCaptureStopped: () => void = () => undefined;
        const captureStopped = new Promise<void>((resolve) => {
            signalCaptureStopped = resolve;
        });
        const recording: ActiveRecording = { session, capture, captureStopped };
        this.active = recording;

        try {
            await capture.startCapture(
                (participantId, chunk) => {
                    session.handleAudio(participantId, chunk);
                },
                () => {
                    signalCaptureStopped();
                    this.handleCaptureStopped(recording);
                }
            );
        } catch (error) {
            if (this.active === recording) {
                this.active = null;
            }
            session.removeAllListeners('recordingEvent');
            this.logger.error(`Failed to start recording in guild ${guildId}:`, error);
            throw new CaptureBackendError(error);
        }

        session.emitEvent('start', { userId: initiatorId });
        this.logger.info(`Started recording session ${session.sessionId}`);
        return session.sessionId;
    }

    /**
     * Stops the active session and resolves once it is complete, with the
     * artifact path or null when nothing usable was recorded. A call made
     * while the session is already finalizing waits for the same result.
     */
    public stopRecording(): Promise<string | null> {
        const recording = this.active;
        if (!recording) {
            return Promise.reject(new NotRecordingError());
        }

        if (!recording.completion) {
            recording.completion = this.completeRecording(recording);
        }
        return recording.completion;
    }

    private handleCaptureStopped(recording: ActiveRecording): void {
        // A stop already in progress reaches this synchronously from stopCapture.
        if (recording.completion || !recording.session.isActive()) return;

        // The backend stopped on its own (for example the voice connection dropped).
        this.logger.warn(`Capture ended before a stop was requested for ${recording.session.sessionId}`);
        recording.completion = this.completeRecording(recording);
        void recording.completion.catch((error: unknown) => {
            this.logger.error(`Failed to finalize ${recording.session.sessionId}:`, error);
        });
    }

    private async completeRecording(recording: ActiveRecording): Promise<string | null> {
        const { session, capture } = recording;
        session.beginFinalizing();

        try {
            const stopped = Promise.resolve(capture.stopCapture()).then(() => recording.captureStopped);
            const drained = await this.waitForCapture(stopped);
            if (!drained) {
                this.logger.warn(`Capture did not report completion within ${this.captureStopTimeoutMs}ms, finalizing anyway`);
            }
        } catch (error) {
            this.logger.error('Failed to stop voice capture cleanly:', error);
        }

        try {
            const artifactPath = await session.finalize(this.mixer);
            if (session.getDroppedChunks() > 0) {
                this.logger.debug(`Ignored ${session.getDroppedChunks()} chunks that arrived after ${session.sessionId} stopped`);
            }
            return artifactPath;
        } finally {
            if (this.active === recording) {
                this.active = null;
            }
        }
    }

    /** Resolves false when the backend neither stops nor reports completion in time. */
    private waitForCapture(stopped: Promise<void>): Promise<boolean> {
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => resolve(false), this.captureStopTimeoutMs);
            void stopped.then(
                () => {
                    clearTimeout(timer);
                    resolve(true);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                }
            );
        });
    }

    /** Presence changes seen while recording. They are logged and never affect the mix. */
    public routeVoiceActivity(participantId: string, joined: boolean, at: number = this.now()): void {
        const session = this.active?.session;
        if (!session || !session.isActive()) return;

        session.recordPresence(participantId, joined, at);
    }

    /** Newest artifact in the recordings directory by modification time. */
    public async getLatestRecording(): Promise<string | null> {
        let entries: string[];
        try {
            entries = await readdir(this.storageDir);
        } catch (error) {
            if (isMissingPath(error)) return null;
            throw error;
        }

        let latest: { path: string; mtimeMs: number } | null = null;
        for (const name of entries) {
            if (!isArtifactName(name)) continue;

            const path = join(this.storageDir, name);
            const stats = await stat(path);
            if (!stats.isFile()) continue;
            if (!latest || stats.mtimeMs > latest.mtimeMs) {
                latest = { path, mtimeMs: stats.mtimeMs };
            }
        }

        return latest?.path ?? null;
    }

    public isRecording(): boolean {
        return this.active !== null;
    }

    public getActiveSession(): RecordingSession | undefined {
        return this.active?.session;
    }

    private forwardEvents(session: RecordingSession): void {
        session.on('recordingEvent', (event: RecordingEvent, data?: RecordingEventData) => {
            for (const handler of this.globalEventHandlers) {
                handler(event, data).catch((error: unknown) => {
                    this.logger.error(`Recording event handler failed for '${event}':`, error);
                });
            }
        });
    }

    private createSessionId(guildId: string): string {
        const timestamp = formatSessionTimestamp(new Date(this.now()));
        if (timestamp !== this.sequenceTimestamp) {
            this.sequenceTimestamp = timestamp;
            this.sessionSequences = new Map();
        }

        const base = `recording_${guildId}_${timestamp}`;
        const previous = this.sessionSequences.get(base);
        if (previous === undefined) {
            this.sessionSequences.set(base, 0);
            return base;
        }

        const sequence = previous + 1;
        this.sessionSequences.set(base, sequence);
        return `${base}_${sequence}`;
    }
}

/** `YYYYMMDD_HHMMSS_mmm` in UTC. */
export function formatSessionTimestamp(date: Date): string {
    const pad = (value: number, length = 2) => value.toString().padStart(length, '0');
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
        + `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
        + `_${pad(date.getUTCMilliseconds(), 3)}`;
}

function isArtifactName(name: string): boolean {
    if (name.endsWith(TEMP_FILE_SUFFIX)) return false;
    const extension = extname(name).slice(1).toLowerCase();
    return AUDIO_FORMATS.some(format => format === extension);
}

function isMissingPath(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
