import { Logger } from '../Logger';
import type { RecordingEvent, RecordingEventData, RecordingEventHandler } from './types';

/** Mirrors session lifecycle events into the logger's audit channel. */
export function createRecordingEventLogger(logger: Logger): RecordingEventHandler {
    return async (event: RecordingEvent, data?: RecordingEventData): Promise<void> => {
        if (!data?.metadata) return;

        const sessionId = data.metadata.sessionId;
        const timestamp = new Date();

        switch (event) {
            case 'start':
                await logger.logEvent(sessionId, {
                    type: 'START',
                    timestamp,
                    userId: data.userId ?? data.metadata.initiator
                });
                break;

            case 'stop':
                await logger.logEvent(sessionId, {
                    type: 'STOP',
                    timestamp,
                    recordingPath: data.metadata.outputPath
                });
                break;

            case 'userJoined':
                await logger.logEvent(sessionId, {
                    type: 'JOIN',
                    timestamp,
                    userId: data.userId
                });
                break;

            case 'userLeft':
                await logger.logEvent(sessionId, {
                    type: 'LEAVE',
                    timestamp,
                    userId: data.userId
                });
                break;

            case 'error':
                logger.warn(`Recording ${sessionId} reported an error: ${data.error?.message ?? 'unknown error'}`);
                break;
        }
    };
}
