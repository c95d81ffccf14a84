import { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import {
    VoiceConnectionStatus,
    type DiscordGatewayAdapterCreator,
    type VoiceConnection
} from '@discordjs/voice';
import type { Command } from './index';
import { Logger } from '../services/Logger';
import { describeError } from '../services/errors';
import { DownloadServer } from '../services/download/DownloadServer';
import { DiscordVoiceCapture } from '../services/recording/DiscordVoiceCapture';
import { RecordingManager } from '../services/recording/RecordingManager';
import { connectWithRetry } from '../utils/voiceConnection';
import { createDownloadEmbed } from '../utils/embeds';

export interface RecordingCommandContext {
    manager: RecordingManager;
    downloadServer: DownloadServer;
    /** Live voice connections keyed by guild id */
    voiceConnections: Map<string, VoiceConnection>;
    voiceConnectAttempts: number;
    tokenTtlSeconds: number;
    logger: Logger;
}

let context: RecordingCommandContext | undefined;

export function initializeCommands(commandContext: RecordingCommandContext): void {
    context = commandContext;
}

function requireContext(): RecordingCommandContext {
    if (!context) {
        throw new Error('Recording commands used before initializeCommands');
    }
    return context;
}

/** Destroys the guild's voice connection, if any, and forgets it. */
export function leaveVoice(voiceConnections: Map<string, VoiceConnection>, guildId: string): void {
    const connection = voiceConnections.get(guildId);
    voiceConnections.delete(guildId);
    if (connection && connection.state.status !== VoiceConnectionStatus.Destroyed) {
        connection.destroy();
    }
}

export const join: Command = {
    data: new SlashCommandBuilder()
        .setName('join')
        .setDescription('Join your voice channel and start recording')
        .setDMPermission(false),

    async execute(interaction: ChatInputCommandInteraction) {
        const { manager, voiceConnections, voiceConnectAttempts, logger } = requireContext();

        if (!interaction.inCachedGuild()) {
            await interaction.reply({ content: '❌ This command only works in a server!', ephemeral: true });
            return;
        }

        const channel = interaction.member.voice.channel;
        if (!channel) {
            await interaction.reply({ content: '❌ You need to be in a voice channel first!', ephemeral: true });
            return;
        }

        if (manager.isRecording()) {
            await interaction.reply({ content: '❌ Already recording in another channel!', ephemeral: true });
            return;
        }

        await interaction.reply({ content: '🔄 Connecting to voice channel...', ephemeral: true });

        let connection: VoiceConnection;
        try {
            connection = await connectWithRetry({
                channelId: channel.id,
                guildId: channel.guild.id,
                // discord.js and @discordjs/voice ship separate copies of the gateway adapter types
                adapterCreator: channel.guild.voiceAdapterCreator as unknown as DiscordGatewayAdapterCreator,
                selfDeaf: false,
                selfMute: true
            }, { attempts: voiceConnectAttempts }, logger.child('VoiceConnection'));
        } catch (error) {
            logger.error('All voice connection attempts failed', error);
            await interaction.followUp({
                content: '❌ Voice connection failed after multiple attempts. Check the server\'s voice region and the bot\'s permissions, then try again.',
                ephemeral: true
            });
            return;
        }

        voiceConnections.set(interaction.guildId, connection);

        try {
            const capture = new DiscordVoiceCapture(connection, logger.child('DiscordVoiceCapture'));
            await manager.startRecording(interaction.guildId, capture, interaction.user.id);
        } catch (error) {
            leaveVoice(voiceConnections, interaction.guildId);
            logger.error('Failed to start recording:', error);
            await interaction.followUp({ content: `❌ Failed to start recording: ${describeError(error)}`, ephemeral: true });
            return;
        }

        logger.info(`Started recording in ${channel.name} (Guild: ${interaction.guildId})`);
        await interaction.followUp({ content: `🎙️ Started recording in ${channel.name}!`, ephemeral: true });
    }
};

export const stop: Command = {
    data: new SlashCommandBuilder()
        .setName('stop')
        .setDescription('Stop recording and process audio')
        .setDMPermission(false),

    async execute(interaction: ChatInputCommandInteraction) {
        const { manager, downloadServer, voiceConnections, tokenTtlSeconds, logger } = requireContext();

        const session = manager.getActiveSession();
        if (!session) {
            await interaction.reply({ content: '❌ Not currently recording!', ephemeral: true });
            return;
        }
        if (session.guildId !== interaction.guildId) {
            await interaction.reply({ content: '❌ Not recording in this server!', ephemeral: true });
            return;
        }

        await interaction.reply({ content: '⏹️ Stopping recording and processing audio...', ephemeral: true });

        try {
            let artifactPath: string | null;
            try {
                artifactPath = await manager.stopRecording();
            } finally {
                leaveVoice(voiceConnections, session.guildId);
            }

            if (!artifactPath) {
                await interaction.followUp({ content: '❌ No audio was recorded!', ephemeral: true });
                return;
            }

            const url = await downloadServer.createLink(artifactPath);
            const embed = createDownloadEmbed(
                '🎵 Recording Complete',
                'Your recording has been processed and is ready for download.',
                url,
                tokenTtlSeconds
            );
            await interaction.followUp({ embeds: [embed], ephemeral: true });
            logger.info(`Recording completed: ${artifactPath}`);
        } catch (error) {
            logger.error('Failed to stop recording:', error);
            await interaction.followUp({ content: `❌ Failed to stop recording: ${describeError(error)}`, ephemeral: true });
        }
    }
};

export const lastRecording: Command = {
    data: new SlashCommandBuilder()
        .setName('last_recording')
        .setDescription('Get download link for the last recording'),

    async execute(interaction: ChatInputCommandInteraction) {
        const { manager, downloadServer, tokenTtlSeconds, logger } = requireContext();

        try {
            const latest = await manager.getLatestRecording();
            if (!latest) {
                await interaction.reply({ content: '❌ No recordings found!', ephemeral: true });
                return;
            }

            const url = await downloadServer.createLink(latest);
            const embed = createDownloadEmbed(
                '🎵 Latest Recording',
                'Download link for your most recent recording.',
                url,
                tokenTtlSeconds,
                0x0000FF
            );
            await interaction.reply({ embeds: [embed], ephemeral: true });
        } catch (error) {
            logger.error('Failed to get last recording:', error);
            await interaction.reply({ content: `❌ Failed to get recording: ${describeError(error)}`, ephemeral: true });
        }
    }
};
