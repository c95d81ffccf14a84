import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger } from '../services/Logger';
import { connectWithRetry, type JoinOptions } from './voiceConnection';

const voice = vi.hoisted(() => ({
    joinVoiceChannel: vi.fn(),
    entersState: vi.fn(),
    getVoiceConnection: vi.fn()
}));

vi.mock('@discordjs/voice', () => ({
    ...voice,
    VoiceConnectionStatus: {
        Signalling: 'signalling',
        Connecting: 'connecting',
        Ready: 'ready',
        Disconnected: 'disconnected',
        Destroyed: 'destroyed'
    }
}));

interface FakeConnection {
    id: number;
    state: { status: string };
    destroy: () => void;
}

function fakeConnection(id: number): FakeConnection {
    const connection: FakeConnection = {
        id,
        state: { status: 'signalling' },
        destroy: vi.fn(() => {
            connection.state = { status: 'destroyed' };
        })
    };
    return connection;
}

const joinOptions: JoinOptions = {
    channelId: 'channel-1',
    guildId: 'guild-1',
    adapterCreator: () => ({ sendPayload: () => true, destroy: () => undefined }),
    selfDeaf: false
};

describe('connectWithRetry', () => {
    let created: FakeConnection[];

    beforeEach(() => {
        vi.resetAllMocks();
        created = [];
        voice.joinVoiceChannel.mockImplementation(() => {
            const connection = fakeConnection(created.length + 1);
            created.push(connection);
            return connection;
        });
    });

    it('returns the first connection that becomes ready', async () => {
        voice.entersState.mockResolvedValueOnce(undefined);

        const connection = await connectWithRetry(joinOptions, { attempts: 3, backoffMs: 0 }, new Logger('error'));

        expect(connection).toBe(created[0]);
        expect(voice.joinVoiceChannel).toHaveBeenCalledTimes(1);
        expect(voice.joinVoiceChannel).toHaveBeenCalledWith(joinOptions);
        expect(voice.entersState).toHaveBeenCalledWith(created[0], 'ready', 8_000);
    });

    it('destroys a failed attempt before retrying', async () => {
        voice.entersState
            .mockRejectedValueOnce(new Error('The operation was aborted'))
            .mockResolvedValueOnce(undefined);

        const connection = await connectWithRetry(joinOptions, { attempts: 3, backoffMs: 0 }, new Logger('error'));

        expect(connection).toBe(created[1]);
        expect(created[0].destroy).toHaveBeenCalledTimes(1);
        expect(created[1].destroy).not.toHaveBeenCalled();
        expect(voice.getVoiceConnection).toHaveBeenCalledTimes(2);
        expect(voice.getVoiceConnection).toHaveBeenCalledWith('guild-1');
    });

    it('clears a leftover connection for the guild first', async () => {
        const leftover = fakeConnection(0);
        voice.getVoiceConnection.mockReturnValueOnce(leftover);
        voice.entersState.mockResolvedValueOnce(undefined);

        await connectWithRetry(joinOptions, { attempts: 1 }, new Logger('error'));

        expect(leftover.destroy).toHaveBeenCalledTimes(1);
    });

    it('gives up after the configured number of attempts', async () => {
        const timeout = new Error('The operation was aborted');
        voice.entersState.mockRejectedValue(timeout);

        const failure = await connectWithRetry(joinOptions, { attempts: 2, backoffMs: 0 }, new Logger('error'))
            .catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(Error);
        expect(failure).toMatchObject({ message: 'Voice connection failed after 2 attempts', cause: timeout });
        expect(voice.joinVoiceChannel).toHaveBeenCalledTimes(2);
        expect(created.every(connection => connection.state.status === 'destroyed')).toBe(true);
    });
});
