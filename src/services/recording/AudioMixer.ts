import { Logger } from '../Logger';
import { TranscodeError, describeError } from '../errors';
import { runProcess } from '../../utils/process';
import type { ProcessRunner, ProcessResult } from '../../utils/process';
import type { AudioFormat, Mixer, MixInput } from './types';

/** How much of ffmpeg's stderr a TranscodeError carries. */
export const STDERR_EXCERPT_LENGTH = 2000;

export interface AudioMixerOptions {
    ffmpegPath: string;
    format: AudioFormat;
    bitrateKbps: number;
    timeoutMs: number;
}

/**
 * Turns per-speaker WAV files into the distributable artifact by shelling
 * out to ffmpeg. One input is re-encoded; several are merged with `amix`.
 */
export class AudioMixer implements Mixer {
    constructor(
        private readonly options: AudioMixerOptions,
        private readonly runner: ProcessRunner = runProcess,
        private readonly logger: Logger = new Logger().child('AudioMixer')
    ) {}

    public async mixAudioFiles(inputs: MixInput[], totalDuration: number, outputPath: string): Promise<string> {
        if (inputs.length === 0) {
            throw new Error('No audio files to mix');
        }
        if (inputs.length === 1) {
            return this.convertSingle(inputs[0].path, outputPath);
        }
        return this.mixMany(inputs, totalDuration, outputPath);
    }

    public async convertSingle(inputPath: string, outputPath: string): Promise<string> {
        await this.run([
            '-y',
            '-i', inputPath,
            ...this.codecArgs(),
            outputPath
        ]);

        this.logger.info(`Converted single file: ${inputPath} -> ${outputPath}`);
        return outputPath;
    }

    public async mixMany(inputs: MixInput[], totalDuration: number, outputPath: string): Promise<string> {
        if (inputs.length === 0) {
            throw new Error('No audio files to mix');
        }

        const args = ['-y'];
        for (const input of inputs) {
            args.push('-i', input.path);
        }
        args.push(
            '-filter_complex', `amix=inputs=${inputs.length}:duration=longest:dropout_transition=2`,
            ...this.codecArgs(),
            outputPath
        );

        this.logger.debug(`Mixing ${inputs.length} inputs over ${totalDuration.toFixed(2)}s`);
        await this.run(args);

        this.logger.info(`Mixed ${inputs.length} files into: ${outputPath}`);
        return outputPath;
    }

    private codecArgs(): string[] {
        if (this.options.format === 'mp3') {
            return ['-c:a', 'libmp3lame', '-b:a', `${this.options.bitrateKbps}k`];
        }
        return ['-c:a', 'pcm_s16le'];
    }

    private async run(args: string[]): Promise<void> {
        const { ffmpegPath, timeoutMs } = this.options;
        this.logger.debug(`Running FFmpeg: ${ffmpegPath} ${args.join(' ')}`);

        let result: ProcessResult;
        try {
            result = await this.runner(ffmpegPath, args, { timeoutMs });
        } catch (error) {
            throw new TranscodeError(null, '', `Failed to launch FFmpeg (${ffmpegPath}): ${describeError(error)}`);
        }

        const stderr = excerpt(result.stderr);
        if (result.timedOut) {
            throw new TranscodeError(null, stderr, `FFmpeg timed out after ${timeoutMs}ms`);
        }
        if (result.exitCode !== 0) {
            throw new TranscodeError(result.exitCode, stderr);
        }

        this.logger.debug('FFmpeg completed successfully');
    }
}

function excerpt(stderr: string): string {
    const trimmed = stderr.trim();
    return trimmed.length > STDERR_EXCERPT_LENGTH ? trimmed.slice(-STDERR_EXCERPT_LENGTH) : trimmed;
}
