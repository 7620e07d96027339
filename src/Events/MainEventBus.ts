/**
 * Event bus for configuration and operation notifications.
 */
import { EventEmitter } from 'events';
import type { EventName, OperationEvent } from '../Domain/index.js';
import { metricsService } from '../Services/MetricsService.js';
import type { ValidatedConfig } from '../Types/Config.js';

/** Payload carried by each event. */
export interface EventPayloads {
    'config.loaded': ValidatedConfig;
    'config.error': unknown; // whatever stopped the document from loading
    'operation.succeeded': OperationEvent;
    'operation.failed': OperationEvent;
}

/**
 * MainEventBus publishes library events to callers that subscribe to them.
 * Every publish is counted in the metrics service.
 */
export class MainEventBus extends EventEmitter {
    /** Typed emit helper enforcing known event names and their payloads. */
    public Emit<T extends EventName>(eventName: T, payload: EventPayloads[T]): boolean {
        metricsService.IncEvent(eventName);
        return super.emit(eventName, payload);
    }

    /** Typed on helper enforcing known event names and their payloads. */
    public On<T extends EventName>(eventName: T, listener: (payload: EventPayloads[T]) => void): this {
        super.on(eventName, listener);
        return this;
    }
}

/**
 * Shared bus used when a service is not given its own.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On('operation.failed', event => console.log(event.code));
 */
export const MAIN_EVENT_BUS = new MainEventBus();
