import {
    ActivityType,
    ChannelType,
    ChatInputCommandInteraction,
    Client,
    Events,
    GatewayIntentBits,
    Interaction,
    PresenceData
} from 'discord.js';
import type { VoiceConnection } from '@discordjs/voice';
import type { BotConfig } from './utils/config';
import { Logger } from './services/Logger';
import { AudioMixer } from './services/recording/AudioMixer';
import { RecordingManager } from './services/recording/RecordingManager';
import { DownloadServer } from './services/download/DownloadServer';
import { createVoiceStateUpdateHandler } from './events/voiceStateUpdate';
import { NotRecordingError } from './services/errors';
import commands, { commandsData, initializeCommands } from './commands';
import { leaveVoice } from './commands/recording';

/** Required gateway intents for the bot's functionality */
const REQUIRED_INTENTS = [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildVoiceStates,
] as const;

/** Bot presence options */
const BOT_PRESENCE: PresenceData = {
    status: 'online',
    activities: [{
        type: ActivityType.Custom,
        name: 'voxtape',
        state: '🎙️ Recording your voice!'
    }]
};

export interface Bot {
    client: Client;
    manager: RecordingManager;
    downloadServer: DownloadServer;
    start(): Promise<void>;
    shutdown(): Promise<void>;
}

export function createBot(config: BotConfig, logger: Logger): Bot {
    const log = logger.child('Bot');
    const client = new Client({
        intents: REQUIRED_INTENTS,
        presence: BOT_PRESENCE
    });

    const mixer = new AudioMixer({
        ffmpegPath: config.ffmpegOptions.path,
        format: config.format,
        bitrateKbps: config.bitrateKbps,
        timeoutMs: config.ffmpegOptions.timeoutMs
    }, undefined, logger.child('AudioMixer'));

    const manager = new RecordingManager({
        storageDir: config.recordingsPath,
        format: config.format,
        mixer,
        logger
    });

    const downloadServer = new DownloadServer({ ...config.download, logger });
    const voiceConnections = new Map<string, VoiceConnection>();

    initializeCommands({
        manager,
        downloadServer,
        voiceConnections,
        voiceConnectAttempts: config.voiceConnectAttempts,
        tokenTtlSeconds: config.download.tokenTtlSeconds,
        logger
    });

    async function handleCommandError(interaction: ChatInputCommandInteraction, error: unknown): Promise<void> {
        log.error(`Command /${interaction.commandName} failed:`, error);

        const errorMessage = {
            content: 'There was an error executing this command!',
            ephemeral: true
        };

        try {
            if (interaction.replied || interaction.deferred) {
                await interaction.followUp(errorMessage);
            } else {
                await interaction.reply(errorMessage);
            }
        } catch (replyError) {
            log.error('Failed to send the error reply:', replyError);
        }
    }

    async function handleCommand(interaction: Interaction): Promise<void> {
        if (!interaction.isChatInputCommand()) return;

        const command = commands.get(interaction.commandName);
        if (!command) return;

        try {
            await command.execute(interaction);
        } catch (error) {
            await handleCommandError(interaction, error);
        }
    }

    async function attachLogChannel(channelId: string): Promise<void> {
        const channel = await client.channels.fetch(channelId);
        if (channel?.type !== ChannelType.GuildText) {
            log.warn('Log channel must be a regular text channel');
            return;
        }
        logger.setLogChannel(channel);
        manager.setLogger(logger);
        log.info('Logger initialized with audit log channel');
    }

    client.once(Events.ClientReady, async (readyClient) => {
        log.info(`Bot is ready! Logged in as ${readyClient.user.tag}`);

        try {
            readyClient.user.setPresence(BOT_PRESENCE);

            if (config.logChannelId) {
                await attachLogChannel(config.logChannelId);
            }

            await downloadServer.start();

            await readyClient.application.commands.set(commandsData);
            log.info(`Registered ${commandsData.length} slash commands`);
        } catch (error) {
            log.error('Bot initialization failed:', error);
        }
    });

    const voiceStateUpdate = createVoiceStateUpdateHandler(
        manager,
        guildId => voiceConnections.get(guildId)?.joinConfig.channelId ?? null
    );

    client.on(Events.InteractionCreate, handleCommand);
    client.on(Events.VoiceStateUpdate, voiceStateUpdate);

    let shuttingDown: Promise<void> | undefined;

    async function shutdown(): Promise<void> {
        log.info('Shutting down');

        try {
            const artifactPath = await manager.stopRecording();
            if (artifactPath) {
                log.info(`Saved recording in progress: ${artifactPath}`);
            }
        } catch (error) {
            if (!(error instanceof NotRecordingError)) {
                log.error('Failed to stop the active recording:', error);
            }
        }

        for (const guildId of Array.from(voiceConnections.keys())) {
            leaveVoice(voiceConnections, guildId);
        }

        try {
            await downloadServer.stop();
        } catch (error) {
            log.error('Failed to stop the download server:', error);
        }

        await client.destroy();
    }

    return {
        client,
        manager,
        downloadServer,
        async start() {
            await client.login(config.token);
        },
        shutdown() {
            shuttingDown ??= shutdown();
            return shuttingDown;
        }
    };
}
