import { TextChannel, EmbedBuilder, Message, ColorResolvable, AttachmentBuilder } from 'discord.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export interface LogEvent {
    type: 'START' | 'STOP' | 'JOIN' | 'LEAVE';
    timestamp: Date;
    userId?: string;
    recordingPath?: string; // Path to the recording file
}

/** Audit channel state shared between a logger and its children. */
interface AuditState {
    logChannel: TextChannel | null;
    events: Map<string, LogEvent[]>;
    activeMessages: Map<string, Message>;
}

export class Logger {
    private readonly audit: AuditState;

    constructor(
        private readonly level: LogLevel = 'info',
        logChannel?: TextChannel,
        private readonly scope?: string,
        audit?: AuditState
    ) {
        this.audit = audit ?? {
            logChannel: logChannel ?? null,
            events: new Map(),
            activeMessages: new Map(),
        };
    }

    /** Logger writing `[scope] message` lines that shares this logger's level and audit channel. */
    public child(scope: string): Logger {
        return new Logger(this.level, undefined, scope, this.audit);
    }

    public setLogChannel(channel: TextChannel): void {
        this.audit.logChannel = channel;
    }

    public isEnabled(level: LogLevel): boolean {
        return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
    }

    public debug(message: string): void {
        if (this.isEnabled('debug')) {
            console.log(this.format(`[DEBUG] ${message}`));
        }
    }

    public info(message: string): void {
        if (this.isEnabled('info')) {
            console.log(this.format(message));
        }
    }

    public warn(message: string): void {
        if (this.isEnabled('warn')) {
            console.warn(this.format(message));
        }
    }

    public error(message: string, error?: unknown): void {
        if (!this.isEnabled('error')) return;
        if (error === undefined) {
            console.error(this.format(message));
        } else {
            console.error(this.format(message), error);
        }
    }

    private format(message: string): string {
        return this.scope ? `[${this.scope}] ${message}` : message;
    }

    async logEvent(sessionId: string, event: LogEvent): Promise<void> {
        const logChannel = this.audit.logChannel;
        if (!logChannel) {
            this.debug('No log channel set');
            return;
        }

        const events = this.audit.events.get(sessionId) ?? [];
        events.push(event);
        this.audit.events.set(sessionId, events);

        if (event.type === 'START') {
            const message = await logChannel.send({ embeds: [this.buildEmbed(sessionId, events)] });
            this.audit.activeMessages.set(sessionId, message);
        } else if (this.audit.activeMessages.has(sessionId)) {
            await this.updateEmbed(sessionId, events);
        }
    }

    private async updateEmbed(sessionId: string, events: LogEvent[]): Promise<void> {
        const message = this.audit.activeMessages.get(sessionId);
        if (!message) return;

        const embed = this.buildEmbed(sessionId, events);
        const lastEvent = events[events.length - 1];

        // Attach the recording when it ends; Discord rejects large files, so fall back to the embed alone.
        if (lastEvent.type === 'STOP' && lastEvent.recordingPath) {
            try {
                const attachment = new AttachmentBuilder(lastEvent.recordingPath);
                await message.edit({ embeds: [embed], files: [attachment] });
            } catch (error) {
                this.error('Failed to attach recording file:', error);
                await message.edit({ embeds: [embed] });
            }
        } else {
            await message.edit({ embeds: [embed] });
        }

        if (lastEvent.type === 'STOP') {
            setTimeout(() => {
                this.audit.activeMessages.delete(sessionId);
                this.audit.events.delete(sessionId);
            }, 60_000).unref();
        }
    }

    private buildEmbed(sessionId: string, events: LogEvent[]): EmbedBuilder {
        const startEvent = events.find(e => e.type === 'START') ?? events[0];
        const lastEvent = events[events.length - 1];
        const ended = lastEvent.type === 'STOP';

        const participants = new Set<string>();
        let activityLog = '';
        for (const event of events) {
            const mention = event.userId ? `<@${event.userId}>` : 'someone';
            const offset = formatDuration(event.timestamp.getTime() - startEvent.timestamp.getTime());

            switch (event.type) {
                case 'START':
                    if (event.userId) participants.add(mention);
                    break;
                case 'JOIN':
                    participants.add(mention);
                    activityLog += `\`${offset}\` ➡️ ${mention} joined\n`;
                    break;
                case 'LEAVE':
                    participants.delete(mention);
                    activityLog += `\`${offset}\` ⬅️ ${mention} left\n`;
                    break;
                case 'STOP':
                    activityLog += `\`${offset}\` 🛑 Recording ended\n`;
                    break;
            }
        }

        const duration = (ended ? lastEvent.timestamp.getTime() : Date.now()) - startEvent.timestamp.getTime();
        const color: ColorResolvable = ended ? 0xFF0000 : 0x00FF00;

        return new EmbedBuilder()
            .setTitle(ended ? '🎙️ Recording Ended' : '🎙️ Recording in Progress')
            .setColor(color)
            .setTimestamp(startEvent.timestamp)
            .addFields([
                { name: 'Recording ID', value: sessionId },
                { name: 'Duration', value: formatDuration(duration), inline: true },
                { name: 'Status', value: ended ? '🔴 Recording Ended' : '🟢 Recording in Progress', inline: true },
                { name: 'Current Participants', value: Array.from(participants).join('\n') || 'No participants' },
                { name: 'Activity Log', value: activityLog || 'No activity recorded' },
            ]);
    }
}

export function formatDuration(ms: number): string {
    const seconds = Math.max(0, Math.floor(ms / 1000));
    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    const remainingSeconds = seconds % 60;
    return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${remainingSeconds.toString().padStart(2, '0')}`;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}
