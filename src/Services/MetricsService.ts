/**
 * MetricsService provides in-memory counters for codec and operation activity.
 * Synchronous; callers read a snapshot when they want numbers.
 *
 * Naming rules follow project conventions: PascalCase for public methods, _camelCase for private state.
 */

export interface MetricsSnapshot {
    containersAllocated: number; // containers the codec allocated
    containersFreed: number; // containers the codec released
    encodes: number; // completed property map encodes
    decodes: number; // completed container decodes
    failures: Record<string, number>; // counts per error code
    eventsPublished: Record<string, number>; // counts per event name
    collectedAt: number; // epoch ms when snapshot taken
}

/** Internal mutable state container */
interface MutableMetricsState extends MetricsSnapshot {}

/**
 * MetricsService – central mutable counter set.
 */
export class MetricsService {
    private _state: MutableMetricsState = {
        containersAllocated: 0,
        containersFreed: 0,
        encodes: 0,
        decodes: 0,
        failures: {},
        eventsPublished: {},
        collectedAt: Date.now(),
    };

    /** Increment allocated container counter */
    public IncAllocated(): void {
        this._state.containersAllocated++;
    }
    /** Increment freed container counter */
    public IncFreed(): void {
        this._state.containersFreed++;
    }
    /** Increment completed encode counter */
    public IncEncode(): void {
        this._state.encodes++;
    }
    /** Increment completed decode counter */
    public IncDecode(): void {
        this._state.decodes++;
    }
    /** Record one raised failure by its code */
    public IncFailure(code: string): void {
        this._state.failures[code] = (this._state.failures[code] ?? 0) + 1;
    }
    /** Increment event publish counter */
    public IncEvent(eventName: string): void {
        this._state.eventsPublished[eventName] = (this._state.eventsPublished[eventName] ?? 0) + 1;
    }

    /** Obtain a point-in-time immutable snapshot */
    public Snapshot(): MetricsSnapshot {
        return {
            containersAllocated: this._state.containersAllocated,
            containersFreed: this._state.containersFreed,
            encodes: this._state.encodes,
            decodes: this._state.decodes,
            failures: { ...this._state.failures },
            eventsPublished: { ...this._state.eventsPublished },
            collectedAt: Date.now(),
        };
    }

    /** Reset all counters (primarily for tests) */
    public Reset(): void {
        this._state.containersAllocated = 0;
        this._state.containersFreed = 0;
        this._state.encodes = 0;
        this._state.decodes = 0;
        this._state.failures = {};
        this._state.eventsPublished = {};
    }
}

/** Global singleton instance. */
export const metricsService = new MetricsService();
