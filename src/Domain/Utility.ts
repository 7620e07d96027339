/**
 * Utility types shared across modules.
 */

/**
 * Central enumeration of well-known event names for typed event bus helpers.
 * Extend as new events are introduced.
 */
export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    configError: 'config.error',
    operationSucceeded: 'operation.succeeded',
    operationFailed: 'operation.failed',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Payload published for every facade operation.
 * @example
 * const event: OperationEvent = { operation: 'snapshot', targets: ['tank/fs@s1'] };
 */
export interface OperationEvent {
    operation: string; // facade operation name, example: 'snapshot'
    targets: string[]; // names the request addressed, example: ['tank/fs@s1']
    code?: string; // error code of the classified failure, absent on success
}
