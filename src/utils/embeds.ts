import { EmbedBuilder, type ColorResolvable } from 'discord.js';

/** "1 hour", "30 minutes", "45 seconds" */
export function describeTtl(seconds: number): string {
    const plural = (value: number, unit: string) => `${value} ${unit}${value === 1 ? '' : 's'}`;
    if (seconds % 3600 === 0) return plural(seconds / 3600, 'hour');
    if (seconds % 60 === 0) return plural(seconds / 60, 'minute');
    return plural(seconds, 'second');
}

/** Creates the embed that hands out a download link */
export function createDownloadEmbed(
    title: string,
    description: string,
    url: string,
    ttlSeconds: number,
    color: ColorResolvable = 0x00FF00
): EmbedBuilder {
    return new EmbedBuilder()
        .setColor(color)
        .setTitle(title)
        .setDescription(description)
        .addFields(
            { name: 'Download', value: `[Click here to download](${url})` },
            { name: 'Note', value: `Download link expires in ${describeTtl(ttlSeconds)}` }
        );
}
