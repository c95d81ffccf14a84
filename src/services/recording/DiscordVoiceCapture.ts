import { finished, type Readable } from 'stream';
import {
    EndBehaviorType,
    VoiceConnectionStatus,
    entersState,
    type VoiceConnection
} from '@discordjs/voice';
import prism from 'prism-media';
import { Logger } from '../Logger';
import { describeError } from '../errors';
import { DISCORD_PCM_FORMAT } from './audio/wav';
import type { AudioChunkHandler, CaptureHandle } from './types';

interface SpeakerStream {
    audio: Readable;
    decoder: prism.opus.Decoder;
}

const OPUS_FRAME_SIZE = 960;
const RECONNECT_GRACE_MS = 5_000;

/**
 * Capture backend for a Discord voice connection. Every speaker gets an
 * opus subscription that ends after a stretch of silence and is opened
 * again the next time they speak.
 */
export class DiscordVoiceCapture implements CaptureHandle {
    private readonly streams = new Map<string, SpeakerStream>();
    private capturing: boolean = false;
    private onAudio?: AudioChunkHandler;
    private onStopped?: () => void;

    constructor(
        private readonly connection: VoiceConnection,
        private readonly logger: Logger = new Logger().child('DiscordVoiceCapture'),
        private readonly silenceDurationMs: number = 1_000
    ) {}

    public startCapture(onAudio: AudioChunkHandler, onStopped: () => void): void {
        if (this.capturing) {
            throw new Error('Capture is already running on this connection');
        }
        if (this.connection.state.status !== VoiceConnectionStatus.Ready) {
            throw new Error(`Voice connection is not ready (${this.connection.state.status})`);
        }

        this.onAudio = onAudio;
        this.onStopped = onStopped;
        this.capturing = true;
        this.connection.receiver.speaking.on('start', this.handleSpeaking);
        this.connection.on(VoiceConnectionStatus.Disconnected, this.handleDisconnect);
        this.connection.on(VoiceConnectionStatus.Destroyed, this.handleDestroyed);
        this.logger.debug(`Listening on channel ${this.connection.joinConfig.channelId}`);
    }

    public stopCapture(): void {
        if (!this.capturing) return;

        this.capturing = false;
        this.connection.receiver.speaking.off('start', this.handleSpeaking);
        this.connection.off(VoiceConnectionStatus.Disconnected, this.handleDisconnect);
        this.connection.off(VoiceConnectionStatus.Destroyed, this.handleDestroyed);

        for (const { audio, decoder } of this.streams.values()) {
            audio.unpipe(decoder);
            audio.destroy();
            decoder.end();
        }
        this.settle();
    }

    private readonly handleSpeaking = (userId: string): void => {
        if (!this.capturing || this.streams.has(userId)) return;

        const audio = this.connection.receiver.subscribe(userId, {
            end: { behavior: EndBehaviorType.AfterSilence, duration: this.silenceDurationMs }
        });
        const decoder = new prism.opus.Decoder({
            rate: DISCORD_PCM_FORMAT.sampleRate,
            channels: DISCORD_PCM_FORMAT.channels,
            frameSize: OPUS_FRAME_SIZE
        });
        this.streams.set(userId, { audio, decoder });

        audio.on('error', (error: Error) => this.logger.warn(`Audio stream error (${userId}): ${error.message}`));
        decoder.on('error', (error: Error) => this.logger.warn(`Opus decoder error (${userId}): ${error.message}`));
        decoder.on('data', (chunk: Buffer) => this.onAudio?.(userId, chunk));

        finished(decoder, () => {
            this.streams.delete(userId);
            this.settle();
        });
        audio.pipe(decoder);
    };

    private readonly handleDisconnect = (): void => {
        Promise.race([
            entersState(this.connection, VoiceConnectionStatus.Signalling, RECONNECT_GRACE_MS),
            entersState(this.connection, VoiceConnectionStatus.Connecting, RECONNECT_GRACE_MS)
        ]).catch((error: unknown) => {
            this.logger.warn(`Voice connection lost: ${describeError(error)}`);
            this.stopCapture();
        });
    };

    private readonly handleDestroyed = (): void => {
        this.logger.warn('Voice connection destroyed while capturing');
        this.stopCapture();
    };

    private settle(): void {
        if (this.capturing || this.streams.size > 0) return;

        const onStopped = this.onStopped;
        this.onStopped = undefined;
        this.onAudio = undefined;
        onStopped?.();
    }
}
