/**
 * Boundary types of the external tagged-container library (libnvpair).
 * Tag values and accessor names are fixed by that library and must not change.
 */

/**
 * Entry type tags, numbered as the external library numbers them.
 */
export enum DataType {
    UNKNOWN = 0,
    BOOLEAN = 1,
    BYTE = 2,
    INT16 = 3,
    UINT16 = 4,
    INT32 = 5,
    UINT32 = 6,
    INT64 = 7,
    UINT64 = 8,
    STRING = 9,
    BYTE_ARRAY = 10,
    INT16_ARRAY = 11,
    UINT16_ARRAY = 12,
    INT32_ARRAY = 13,
    UINT32_ARRAY = 14,
    INT64_ARRAY = 15,
    UINT64_ARRAY = 16,
    STRING_ARRAY = 17,
    HRTIME = 18,
    NVLIST = 19,
    NVLIST_ARRAY = 20,
    BOOLEAN_VALUE = 21,
    INT8 = 22,
    UINT8 = 23,
    BOOLEAN_ARRAY = 24,
    INT8_ARRAY = 25,
    UINT8_ARRAY = 26,
    DOUBLE = 27,
}

/** `nvlist_alloc` flag requesting unique entry names. */
export const NV_UNIQUE_NAME = 0x1;

/**
 * Opaque reference to a container owned by the external library.
 * The address is meaningful only to the library that issued it.
 */
export class NvlistHandle {
    constructor(public readonly address: number) {}
}

/** Opaque reference to a single entry inside a container. */
export class NvpairHandle {
    constructor(public readonly address: number) {}
}

/**
 * Host-side payload of one element, per element kind.
 * 64-bit integers travel as bigint; everything narrower as number.
 */
export interface WireScalarMap {
    boolean_value: boolean;
    byte: number;
    int8: number;
    uint8: number;
    int16: number;
    uint16: number;
    int32: number;
    uint32: number;
    int64: bigint;
    uint64: bigint;
    string: string;
    nvlist: NvlistHandle;
}

/** Element kinds that have a typed accessor pair. */
export type ElementKind = keyof WireScalarMap;

/** Integer kinds with an explicit width and signedness. */
export type IntegerKind = `int8` | `uint8` | `int16` | `uint16` | `int32` | `uint32` | `int64` | `uint64`;

/** Any single wire payload value. */
export type WireScalar = WireScalarMap[ElementKind];

/** A scalar payload tagged with its kind. */
export type WireDatum = { [K in ElementKind]: { kind: K; value: WireScalarMap[K] } }[ElementKind];

/** An array payload tagged with its element kind. */
export type WireArrayDatum = { [K in ElementKind]: { kind: K; values: WireScalarMap[K][] } }[ElementKind];

/** Result of a read accessor: non-zero status means the read failed. */
export interface WireRead<T> {
    status: number;
    result?: T;
}

/** Result of an array read accessor: element count plus the element buffer. */
export interface WireArrayRead extends WireRead<WireArrayDatum> {
    count: number;
}

/** Result of `nvlist_alloc`. */
export interface AllocResult {
    status: number;
    nvl?: NvlistHandle;
}

/**
 * Output parameter for calls that allocate a container on the caller's behalf.
 * Starts empty; the callee stores the container it allocated.
 */
export interface NvlistSlot {
    nvl: NvlistHandle | null;
}

/**
 * Accessor surface of the external container library.
 * Write accessors return a status code (0 on success); read accessors return the status with the payload.
 * Add calls copy their payload, so the caller keeps ownership of any container it passes in.
 */
export interface NvpairLibrary {
    /** nvlist_alloc */
    Alloc(flags: number): AllocResult;
    /** nvlist_free */
    Free(nvl: NvlistHandle): void;
    /** nvlist_add_boolean (presence-only entry) */
    AddBoolean(nvl: NvlistHandle, name: string): number;
    /** nvlist_add_<kind> */
    Add(nvl: NvlistHandle, name: string, datum: WireDatum): number;
    /** nvlist_add_<kind>_array */
    AddArray(nvl: NvlistHandle, name: string, datum: WireArrayDatum): number;
    /** nvlist_next_nvpair; pass null to start, returns null after the last entry. */
    NextPair(nvl: NvlistHandle, previous: NvpairHandle | null): NvpairHandle | null;
    /** nvpair_name */
    PairName(pair: NvpairHandle): string;
    /** nvpair_type */
    PairType(pair: NvpairHandle): DataType;
    /** nvpair_type_is_array */
    PairIsArray(pair: NvpairHandle): boolean;
    /** nvpair_value_<kind> */
    Value(pair: NvpairHandle, kind: ElementKind): WireRead<WireDatum>;
    /** nvpair_value_<kind>_array */
    ArrayValue(pair: NvpairHandle, kind: ElementKind): WireArrayRead;
}
