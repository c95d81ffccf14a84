import type { VoiceState } from 'discord.js';
import { RecordingManager } from '../services/recording/RecordingManager';

export type VoiceTransition = 'joined' | 'left';

/**
 * What a channel change means for the recorded channel. Moving between two
 * other channels, or staying put (mute, deafen), is not a transition.
 */
export function classifyVoiceTransition(
    recordedChannelId: string,
    oldChannelId: string | null,
    newChannelId: string | null
): VoiceTransition | null {
    if (oldChannelId === newChannelId) return null;
    if (newChannelId === recordedChannelId) return 'joined';
    if (oldChannelId === recordedChannelId) return 'left';
    return null;
}

/** Forwards members entering or leaving the recorded channel to the manager. */
export function createVoiceStateUpdateHandler(
    manager: RecordingManager,
    getRecordedChannelId: (guildId: string) => string | null
) {
    return (oldState: VoiceState, newState: VoiceState): void => {
        // Ignore bots, including ourselves
        if (newState.member?.user.bot) return;

        const session = manager.getActiveSession();
        if (!session || session.guildId !== newState.guild.id) return;

        const recordedChannelId = getRecordedChannelId(session.guildId);
        if (!recordedChannelId) return;

        const transition = classifyVoiceTransition(recordedChannelId, oldState.channelId, newState.channelId);
        if (transition) {
            manager.routeVoiceActivity(newState.id, transition === 'joined');
        }
    };
}
