import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import type { AudioChunkHandler, CaptureHandle, Mixer, MixInput } from './types';

/** Mixer stand-in that writes a placeholder artifact and remembers its calls. */
export class FakeMixer implements Mixer {
    public readonly singleCalls: Array<{ inputPath: string; outputPath: string; inputExisted: boolean }> = [];
    public readonly manyCalls: Array<{ inputs: MixInput[]; totalDuration: number; outputPath: string; inputsExisted: boolean }> = [];
    public failWith?: Error;
    /** When failing, write the output first, as ffmpeg does before it dies. */
    public writeBeforeFailing: boolean = false;

    public async convertSingle(inputPath: string, outputPath: string): Promise<string> {
        this.singleCalls.push({ inputPath, outputPath, inputExisted: existsSync(inputPath) });
        return this.produce(outputPath);
    }

    public async mixMany(inputs: MixInput[], totalDuration: number, outputPath: string): Promise<string> {
        this.manyCalls.push({
            inputs,
            totalDuration,
            outputPath,
            inputsExisted: inputs.every(input => existsSync(input.path))
        });
        return this.produce(outputPath);
    }

    private async produce(outputPath: string): Promise<string> {
        if (this.failWith && !this.writeBeforeFailing) throw this.failWith;
        await writeFile(outputPath, 'mixed');
        if (this.failWith) throw this.failWith;
        return outputPath;
    }
}

/**
 * Capture backend driven by the test: `emit` delivers audio, `stopCapture`
 * reports completion unless `holdStop` is set.
 */
export class FakeCapture implements CaptureHandle {
    public started: boolean = false;
    public stopCalls: number = 0;
    public holdStop: boolean = false;
    /** `stopCapture` returns a promise that never settles. */
    public hangStop: boolean = false;
    public failStart?: Error;
    private onAudio?: AudioChunkHandler;
    private onStopped?: () => void;

    public async startCapture(onAudio: AudioChunkHandler, onStopped: () => void): Promise<void> {
        if (this.failStart) throw this.failStart;
        this.started = true;
        this.onAudio = onAudio;
        this.onStopped = onStopped;
    }

    public stopCapture(): void | Promise<void> {
        this.stopCalls++;
        if (this.hangStop) {
            return new Promise<void>(() => undefined);
        }
        if (!this.holdStop) {
            this.finish();
        }
    }

    public emit(participantId: string, chunk: Buffer): void {
        this.onAudio?.(participantId, chunk);
    }

    /** Signals that the backend drained, as a real one would after its streams close. */
    public finish(): void {
        const onStopped = this.onStopped;
        this.onStopped = undefined;
        onStopped?.();
    }
}
