/**
 * Fixed table of wire element kinds: tags, accessor names and host conversions.
 * Pure data; the codec dispatches through it in both directions.
 */
import { DataType, NvlistHandle, type ElementKind, type IntegerKind, type WireScalar } from '../Domain/Wire.js';

/** Host representation of a decoded scalar, or the embedded container of a nested entry. */
export type Converted = boolean | number | bigint | string | NvlistHandle;

/**
 * Registry entry for one element kind.
 * @example
 * TYPE_TABLE.uint32.arrayAccessor; // 'uint32_array'
 */
export interface TypeInfo {
    kind: ElementKind;
    scalarType: DataType; // tag of a single value
    arrayType: DataType; // tag of an array of values
    scalarAccessor: string; // accessor suffix, example: 'uint32'
    arrayAccessor: string; // accessor suffix, example: 'uint32_array'
    convert: (raw: WireScalar) => Converted | undefined; // undefined when the payload has the wrong host type
}

function ToBoolean(raw: WireScalar): Converted | undefined {
    return typeof raw === `boolean` ? raw : undefined;
}

function ToNarrowInteger(raw: WireScalar): Converted | undefined {
    return typeof raw === `number` && Number.isInteger(raw) ? raw : undefined;
}

function ToWideInteger(raw: WireScalar): Converted | undefined {
    if (typeof raw !== `bigint`) {
        return undefined;
    }
    return ToHostInteger(raw);
}

function ToString(raw: WireScalar): Converted | undefined {
    return typeof raw === `string` ? raw : undefined;
}

function ToNvlist(raw: WireScalar): Converted | undefined {
    return raw instanceof NvlistHandle ? raw : undefined;
}

function Entry(
    kind: ElementKind,
    scalarType: DataType,
    arrayType: DataType,
    convert: TypeInfo[`convert`],
    scalarAccessor: string = kind,
    arrayAccessor: string = `${kind}_array`,
): TypeInfo {
    return { kind, scalarType, arrayType, scalarAccessor, arrayAccessor, convert };
}

export const TYPE_TABLE: Readonly<Record<ElementKind, TypeInfo>> = {
    boolean_value: Entry(`boolean_value`, DataType.BOOLEAN_VALUE, DataType.BOOLEAN_ARRAY, ToBoolean, `boolean_value`, `boolean_array`),
    byte: Entry(`byte`, DataType.BYTE, DataType.BYTE_ARRAY, ToNarrowInteger),
    int8: Entry(`int8`, DataType.INT8, DataType.INT8_ARRAY, ToNarrowInteger),
    uint8: Entry(`uint8`, DataType.UINT8, DataType.UINT8_ARRAY, ToNarrowInteger),
    int16: Entry(`int16`, DataType.INT16, DataType.INT16_ARRAY, ToNarrowInteger),
    uint16: Entry(`uint16`, DataType.UINT16, DataType.UINT16_ARRAY, ToNarrowInteger),
    int32: Entry(`int32`, DataType.INT32, DataType.INT32_ARRAY, ToNarrowInteger),
    uint32: Entry(`uint32`, DataType.UINT32, DataType.UINT32_ARRAY, ToNarrowInteger),
    int64: Entry(`int64`, DataType.INT64, DataType.INT64_ARRAY, ToWideInteger),
    uint64: Entry(`uint64`, DataType.UINT64, DataType.UINT64_ARRAY, ToWideInteger),
    string: Entry(`string`, DataType.STRING, DataType.STRING_ARRAY, ToString),
    nvlist: Entry(`nvlist`, DataType.NVLIST, DataType.NVLIST_ARRAY, ToNvlist),
};

/** What a tag read from the wire denotes. */
export type TagInfo = { presence: true } | { presence: false; info: TypeInfo; isArray: boolean };

const TAG_INDEX: ReadonlyMap<DataType, TagInfo> = (() => {
    const index = new Map<DataType, TagInfo>([[DataType.BOOLEAN, { presence: true }]]);
    for (const info of Object.values(TYPE_TABLE)) {
        index.set(info.scalarType, { presence: false, info, isArray: false });
        index.set(info.arrayType, { presence: false, info, isArray: true });
    }
    return index;
})();

/**
 * Resolves a wire tag.
 * @param tag DataType - Tag reported by the library
 * @returns TagInfo | undefined - undefined for tags with no host representation (hrtime, double, unknown)
 */
export function LookupDataType(tag: DataType): TagInfo | undefined {
    return TAG_INDEX.get(tag);
}

/**
 * Renders the external accessor name for diagnostics.
 * @example
 * AccessorName('add', 'boolean_value', true); // 'nvlist_add_boolean_array'
 * AccessorName('value', 'uint32', false); // 'nvpair_value_uint32'
 */
export function AccessorName(op: `add` | `value`, kind: ElementKind, isArray: boolean): string {
    const info = TYPE_TABLE[kind];
    const suffix = isArray ? info.arrayAccessor : info.scalarAccessor;
    return op === `add` ? `nvlist_add_${suffix}` : `nvpair_value_${suffix}`;
}

/** Inclusive ranges of the integer kinds and of the byte type. */
export const INTEGER_RANGES: Readonly<Record<IntegerKind | `byte`, readonly [bigint, bigint]>> = {
    byte: [0n, 0xffn],
    int8: [-(2n ** 7n), 2n ** 7n - 1n],
    uint8: [0n, 2n ** 8n - 1n],
    int16: [-(2n ** 15n), 2n ** 15n - 1n],
    uint16: [0n, 2n ** 16n - 1n],
    int32: [-(2n ** 31n), 2n ** 31n - 1n],
    uint32: [0n, 2n ** 32n - 1n],
    int64: [-(2n ** 63n), 2n ** 63n - 1n],
    uint64: [0n, 2n ** 64n - 1n],
};

/** Every sized integer kind, narrowest first. */
export const INTEGER_KINDS: readonly IntegerKind[] = [
    `int8`,
    `uint8`,
    `int16`,
    `uint16`,
    `int32`,
    `uint32`,
    `int64`,
    `uint64`,
];

/** Integer kind used for plain host integers under keys missing from the fixed-width table. */
export const DEFAULT_INTEGER_KIND: IntegerKind = `uint64`;

/**
 * Keys whose plain integer values are always written with a fixed width,
 * whatever the host value looks like. Only integer properties belong here.
 */
export const FIXED_WIDTH_KEYS: Readonly<Record<string, IntegerKind>> = {
    'rewind-request': `uint32`,
    type: `uint32`,
    N_MORE_ERRORS: `int32`,
    pool_context: `int32`,
};

/**
 * Narrows a 64-bit wire value to a host integer: number while it is a safe integer, bigint beyond.
 * @example
 * ToHostInteger(5n); // 5
 * ToHostInteger(2n ** 60n); // 1152921504606846976n
 */
export function ToHostInteger(value: bigint): number | bigint {
    const min = BigInt(Number.MIN_SAFE_INTEGER);
    const max = BigInt(Number.MAX_SAFE_INTEGER);
    return value >= min && value <= max ? Number(value) : value;
}
