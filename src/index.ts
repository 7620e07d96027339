/**
 * Public surface of the library.
 */

export * from './Domain/index.js';

export { AppError, ERROR_CODES, InternalError, ValidationError } from './Common/Errors.js';
export type { ErrorCode, ErrorDetails } from './Common/Errors.js';
export { GetLogLevel, SetLogLevel } from './Common/Log.js';
export type { LogThreshold } from './Common/Log.js';

export { NvlistCodec } from './Nvlist/Codec.js';
export type { NvlistCodecOptions } from './Nvlist/Codec.js';
export { NvlistDecodeError, NvlistMemoryError, NvlistTypeError } from './Nvlist/Errors.js';
export { MemoryNvpair } from './Nvlist/MemoryNvpair.js';
export { AccessorName, FIXED_WIDTH_KEYS, LookupDataType, TYPE_TABLE } from './Nvlist/TypeRegistry.js';

export * from './Names/NameSyntax.js';

export * from './Classifier/Failures.js';
export * from './Classifier/Operations.js';
export { HandleErrorList, MORE_ERRORS_KEY, ParseItemErrors } from './Classifier/Batch.js';
export type { ItemErrorMap, ItemMapper } from './Classifier/Batch.js';

export { ApplyEnvOverrides, ENV_LOG_LEVEL, LoadConfig } from './Config.js';
export { ConfigService } from './Services/ConfigService.js';
export type { ValidatedConfig } from './Types/Config.js';
export { LzcService } from './Services/LzcService.js';
export type { LzcServiceOptions } from './Services/LzcService.js';
export { MetricsService, metricsService } from './Services/MetricsService.js';
export type { MetricsSnapshot } from './Services/MetricsService.js';
export { MAIN_EVENT_BUS, MainEventBus } from './Events/MainEventBus.js';
export type { EventPayloads } from './Events/MainEventBus.js';
