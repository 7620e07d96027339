/**
 * Domain types shared across the library.
 */

// Wire container boundary
export { DataType, NV_UNIQUE_NAME, NvlistHandle, NvpairHandle } from './Wire.js';
export type {
    AllocResult,
    ElementKind,
    IntegerKind,
    NvlistSlot,
    NvpairLibrary,
    WireArrayDatum,
    WireArrayRead,
    WireDatum,
    WireRead,
    WireScalar,
    WireScalarMap,
} from './Wire.js';

// Management call boundary
export { ObjsetType, SEND_FLAGS } from './Lzc.js';
export type { LzcLibrary, SendFlag, StatusWith } from './Lzc.js';

// Property model
export { TypedValue, byte, booleanT, int8, uint8, int16, uint16, int32, uint32, int64, uint64 } from './Property.js';
export type { PropertyInput, PropertyMap, PropertyRecord, PropertyScalar, PropertyValue, TypedKind } from './Property.js';

// Status codes
export { Errno, StatusName } from './Errno.js';

// Utility Types
export type { EventName, OperationEvent } from './Utility.js';

// Event Names constant
export { EVENT_NAMES } from './Utility.js';
