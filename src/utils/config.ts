import { resolve } from 'path';
import { isLogLevel, type LogLevel } from '../services/Logger';
import type { AudioFormat } from '../services/recording/types';

/** Configuration interface for the bot */
export interface BotConfig {
    /** Discord bot token */
    token: string;
    /** Absolute path of the directory holding artifacts and temporary files */
    recordingsPath: string;
    format: AudioFormat;
    bitrateKbps: number;
    ffmpegOptions: {
        path: string;
        timeoutMs: number;
    };
    download: {
        host: string;
        port: number;
        publicUrl?: string;
        tokenTtlSeconds: number;
    };
    logLevel: LogLevel;
    /** Channel ID for recording logs */
    logChannelId?: string;
    voiceConnectAttempts: number;
}

type Env = Record<string, string | undefined>;

/** Validates environment variables and returns config object */
export function validateConfig(env: Env = process.env): BotConfig {
    const token = env.DISCORD_TOKEN;
    if (!token) throw new Error('DISCORD_TOKEN is required');

    const format = env.RECORDING_FORMAT ?? 'mp3';
    if (format !== 'mp3' && format !== 'wav') {
        throw new Error('RECORDING_FORMAT must be mp3 or wav');
    }

    const logLevel = env.LOG_LEVEL ?? 'info';
    if (!isLogLevel(logLevel)) {
        throw new Error('LOG_LEVEL must be one of debug, info, warn, error');
    }

    return {
        token,
        recordingsPath: resolve(env.RECORDINGS_DIR || 'recordings'),
        format,
        bitrateKbps: readInteger(env, 'AUDIO_BITRATE_KBPS', 128, 64, 384),
        ffmpegOptions: {
            path: env.FFMPEG_PATH || 'ffmpeg',
            timeoutMs: readInteger(env, 'FFMPEG_TIMEOUT_MS', 600_000, 1),
        },
        download: {
            host: env.DOWNLOAD_HOST || '127.0.0.1',
            port: readInteger(env, 'DOWNLOAD_PORT', 8000, 0, 65535),
            publicUrl: env.DOWNLOAD_PUBLIC_URL || undefined,
            tokenTtlSeconds: readInteger(env, 'DOWNLOAD_TOKEN_TTL_SECONDS', 3600, 1),
        },
        logLevel,
        logChannelId: env.LOG_CHANNEL_ID || undefined,
        voiceConnectAttempts: readInteger(env, 'VOICE_CONNECT_ATTEMPTS', 3, 1),
    };
}

function readInteger(env: Env, name: string, fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new Error(max === Number.MAX_SAFE_INTEGER
            ? `${name} must be an integer of at least ${min}`
            : `${name} must be an integer between ${min} and ${max}`);
    }
    return value;
}
