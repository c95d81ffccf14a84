export type AudioFormat = 'wav' | 'mp3';

export const AUDIO_FORMATS: readonly AudioFormat[] = ['mp3', 'wav'];

export type SessionState = 'active' | 'finalizing' | 'complete';

/** Milliseconds since the epoch, `Date.now` by default. Injected so tests can move time. */
export type Clock = () => number;

export type AudioChunkHandler = (participantId: string, chunk: Buffer) => void;

/**
 * The two things the recorder needs from a voice backend: a way to start
 * routing decoded PCM per speaker, and a way to stop it. `onStopped` fires
 * once every speaker stream has drained after `stopCapture`.
 */
export interface CaptureHandle {
    startCapture(onAudio: AudioChunkHandler, onStopped: () => void): void | Promise<void>;
    stopCapture(): void | Promise<void>;
}

/** Receives decoded bytes tagged by participant until it is closed. */
export interface AudioSink {
    readonly closed: boolean;
    write(participantId: string, chunk: Buffer): boolean;
    close(): void;
}

export interface MixInput {
    path: string;
    /** Accepted for every input but not applied as a delay; see DESIGN.md. */
    startOffsetSeconds: number;
}

export interface Mixer {
    convertSingle(inputPath: string, outputPath: string): Promise<string>;
    mixMany(inputs: MixInput[], totalDuration: number, outputPath: string): Promise<string>;
}

export interface RecordingMetadata {
    sessionId: string;
    guildId: string;
    state: SessionState;
    startTime: Date;
    endTime?: Date;
    participants: string[];
    initiator?: string;
    outputPath?: string;  // Path to the final recording file
}

export type RecordingEvent =
    | 'start'
    | 'stop'
    | 'error'
    | 'userJoined'
    | 'userLeft';

export interface RecordingEventData {
    userId?: string;
    error?: Error;
    metadata?: RecordingMetadata;
    offsetSeconds?: number;
}

export type RecordingEventHandler = (event: RecordingEvent, data?: RecordingEventData) => Promise<void>;
