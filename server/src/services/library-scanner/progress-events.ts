/**
 * Scan Progress Events
 *
 * Progress notifications published while a scan runs, and an in-process
 * EventEmitter sink for hosts that relay them elsewhere (SSE, websockets).
 */

import { EventEmitter } from 'events';
import { errorMessage, type ScanLogger } from '../logger.service.js';
import type { FileScanProgressEvent, ProgressEventSink, ProgressEventType } from './types.js';

export const NOTIFICATION_PROGRESS = 'NotificationProgress';

export function fileScanProgressEvent(
  path: string,
  libraryName: string,
  progressEventType: ProgressEventType,
  filesProcessed: number
): FileScanProgressEvent {
  return {
    name: 'FileScanProgress',
    path,
    libraryName,
    progressEventType,
    filesProcessed,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Publish without waiting. A sink that rejects is logged, never rethrown.
 */
export function publishProgress(
  sink: ProgressEventSink,
  event: FileScanProgressEvent,
  logger: ScanLogger
): void {
  try {
    const pending = sink.publish(NOTIFICATION_PROGRESS, event);
    if (pending instanceof Promise) {
      pending.catch((err: unknown) => {
        logger.warn({ event: event.progressEventType, error: errorMessage(err) }, 'Failed to publish scan progress');
      });
    }
  } catch (err) {
    logger.warn({ event: event.progressEventType, error: errorMessage(err) }, 'Failed to publish scan progress');
  }
}

/**
 * Sink that re-emits every notification under its event name.
 */
export class ScanEventHub extends EventEmitter implements ProgressEventSink {
  publish(eventName: string, payload: FileScanProgressEvent): void {
    this.emit(eventName, payload);
  }
}

/** Sink that drops everything. */
export const nullEventSink: ProgressEventSink = {
  publish: () => undefined,
};
