import { setTimeout as sleep } from 'timers/promises';
import {
    entersState,
    getVoiceConnection,
    joinVoiceChannel,
    VoiceConnectionStatus,
    type VoiceConnection
} from '@discordjs/voice';
import { Logger } from '../services/Logger';
import { describeError } from '../services/errors';

export type JoinOptions = Parameters<typeof joinVoiceChannel>[0];

export interface ConnectOptions {
    attempts: number;
    readyTimeoutMs?: number;
    backoffMs?: number;
}

/**
 * Joins a voice channel, retrying when the connection does not become ready
 * in time. Any connection left over from an earlier attempt is destroyed
 * before the next one starts.
 */
export async function connectWithRetry(
    joinOptions: JoinOptions,
    { attempts, readyTimeoutMs = 8_000, backoffMs = 2_000 }: ConnectOptions,
    logger: Logger = new Logger().child('VoiceConnection')
): Promise<VoiceConnection> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
        getVoiceConnection(joinOptions.guildId)?.destroy();
        logger.info(`Voice connection attempt ${attempt}/${attempts}`);

        const connection = joinVoiceChannel(joinOptions);
        try {
            await entersState(connection, VoiceConnectionStatus.Ready, readyTimeoutMs);
            return connection;
        } catch (error) {
            lastError = error;
            logger.warn(`Voice connection attempt ${attempt} failed: ${describeError(error)}`);
            if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
                connection.destroy();
            }
        }

        if (attempt < attempts) {
            await sleep(backoffMs);
        }
    }

    throw new Error(`Voice connection failed after ${attempts} attempts`, { cause: lastError });
}
