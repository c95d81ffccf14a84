import { Collection, ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import * as recordingCommands from './recording';

/** Interface for command structure */
export interface Command {
    /** Command metadata and structure */
    data: SlashCommandBuilder;
    /** Command execution function */
    execute: (interaction: ChatInputCommandInteraction) => Promise<void>;
}

const available: Command[] = [
    recordingCommands.join,
    recordingCommands.stop,
    recordingCommands.lastRecording
];

/** Collection of available bot commands */
const commands = new Collection<string, Command>();
for (const command of available) {
    commands.set(command.data.name, command);
}

/** Command data for Discord API registration */
export const commandsData = available.map(command => command.data.toJSON());

export { initializeCommands } from './recording';
export default commands;
