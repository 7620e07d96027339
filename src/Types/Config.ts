import type { LogThreshold } from '../Common/Log.js';
import type { IntegerKind } from '../Domain/Wire.js';

/**
 * Validated configuration shape used across services.
 */
export interface ValidatedConfig {
    logLevel: LogThreshold;
    integerKeyTypes: Record<string, IntegerKind>; // merged over the built-in fixed-width keys
    emitEvents: boolean; // whether the facade publishes operation events
}
