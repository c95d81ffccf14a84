export type RecordingErrorCode =
    | 'ALREADY_RECORDING'
    | 'NOT_RECORDING'
    | 'TRANSCODE_FAILED'
    | 'FILE_NOT_FOUND'
    | 'CAPTURE_BACKEND';

/**
 * Base class for every failure the recording and download services report.
 * Callers switch on `code` instead of matching messages.
 */
export abstract class RecordingError extends Error {
    constructor(
        message: string,
        public readonly code: RecordingErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = this.constructor.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class AlreadyRecordingError extends RecordingError {
    constructor(public readonly guildId: string) {
        super(`Already recording in guild ${guildId}`, 'ALREADY_RECORDING');
    }
}

export class NotRecordingError extends RecordingError {
    constructor() {
        super('Not currently recording', 'NOT_RECORDING');
    }
}

export class TranscodeError extends RecordingError {
    constructor(
        public readonly exitCode: number | null,
        public readonly stderr: string,
        message = `FFmpeg process exited with code ${exitCode}`
    ) {
        super(message, 'TRANSCODE_FAILED');
    }
}

export class FileNotFoundError extends RecordingError {
    constructor(public readonly filePath: string) {
        super(`File not found: ${filePath}`, 'FILE_NOT_FOUND');
    }
}

export class CaptureBackendError extends RecordingError {
    constructor(cause: unknown) {
        super(`Voice capture failed: ${describeError(cause)}`, 'CAPTURE_BACKEND', { cause });
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
