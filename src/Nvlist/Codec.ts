/**
 * Conversion between host property maps and the external tagged container.
 *
 * Every container the codec allocates is released before the call that allocated it returns,
 * on the error path as well. The caller never sees a handle outside the `In` / `Out` callbacks.
 */
import { ERROR_CODES } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import {
    TypedValue,
    type PropertyInput,
    type PropertyMap,
    type PropertyRecord,
    type PropertyValue,
} from '../Domain/Property.js';
import {
    NV_UNIQUE_NAME,
    NvlistHandle,
    type IntegerKind,
    type NvlistSlot,
    type NvpairHandle,
    type NvpairLibrary,
    type WireArrayDatum,
    type WireDatum,
    type WireScalar,
} from '../Domain/Wire.js';
import { metricsService, type MetricsService } from '../Services/MetricsService.js';
import { NvlistDecodeError, NvlistMemoryError, NvlistTypeError } from './Errors.js';
import {
    AccessorName,
    DEFAULT_INTEGER_KIND,
    FIXED_WIDTH_KEYS,
    INTEGER_RANGES,
    LookupDataType,
    type TypeInfo,
} from './TypeRegistry.js';

const FROM = log.Helper_LocationBuilder(`Nvlist`, `NvlistCodec`);

/** Options for a codec instance. */
export interface NvlistCodecOptions {
    /** Extra keys whose plain integers are written with a fixed width; merged over the built-in table. */
    integerKeyTypes?: Readonly<Record<string, IntegerKind>>;
    /** Counter sink; defaults to the shared metrics service. */
    metrics?: MetricsService;
}

/**
 * A host value sorted into exactly one wire variant.
 * Integers carry the kind they will be written as and a bigint payload for range checks.
 */
type HostValue =
    | { variant: `presence` }
    | { variant: `boolean`; value: boolean; explicit: boolean }
    | { variant: `string`; value: string }
    | { variant: `integer`; kind: IntegerKind | `byte`; value: bigint; explicit: boolean }
    | { variant: `map`; value: PropertyInput }
    | { variant: `array`; value: readonly PropertyValue[] };

function IsPropertyArray(value: PropertyValue): value is readonly PropertyValue[] {
    return Array.isArray(value);
}

function IsPropertyRecord(value: PropertyValue): value is PropertyRecord {
    if (typeof value !== `object` || value === null || value instanceof Map || value instanceof TypedValue) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function DescribeHostType(value: unknown): string {
    if (value === null) {
        return `null`;
    }
    if (Array.isArray(value)) {
        return `array`;
    }
    if (typeof value === `object`) {
        return value.constructor?.name ?? `object`;
    }
    return typeof value;
}

/** Signature used for array homogeneity: variant, plus width for explicitly sized values. */
function Signature(host: HostValue): string {
    switch (host.variant) {
        case `boolean`:
            return host.explicit ? `boolean_t` : `boolean`;
        case `integer`:
            return host.explicit ? host.kind : `integer`;
        default:
            return host.variant;
    }
}

function Entries(props: PropertyInput): Iterable<[string, PropertyValue]> {
    return props instanceof Map ? props.entries() : Object.entries(props);
}

function IntegerDatum(kind: IntegerKind | `byte`, value: bigint): WireDatum {
    switch (kind) {
        case `int64`:
        case `uint64`:
            return { kind, value };
        default:
            return { kind, value: Number(value) };
    }
}

function IntegerArrayDatum(kind: IntegerKind | `byte`, values: bigint[]): WireArrayDatum {
    switch (kind) {
        case `int64`:
        case `uint64`:
            return { kind, values };
        default:
            return {
                kind,
                values: values.map(value => {
                    return Number(value);
                }),
            };
    }
}

/**
 * NvlistCodec converts property maps to containers of a given library and back.
 * @example
 * const codec = new NvlistCodec(new MemoryNvpair());
 * const out = new Map();
 * codec.In({ compression: 'lz4' }, nvl => codec.Decode(nvl, out));
 */
export class NvlistCodec {
    private _integerKeyTypes: ReadonlyMap<string, IntegerKind>;
    private _metrics: MetricsService;

    /**
     * @param lib NvpairLibrary - Container library every handle belongs to
     * @param options NvlistCodecOptions - Fixed-width key extensions and metrics sink
     */
    constructor(
        private readonly lib: NvpairLibrary,
        options: NvlistCodecOptions = {},
    ) {
        // own keys only: 'constructor' or 'toString' never resolve to Object.prototype members
        this._integerKeyTypes = new Map<string, IntegerKind>(
            Object.entries({ ...FIXED_WIDTH_KEYS, ...options.integerKeyTypes }),
        );
        this._metrics = options.metrics ?? metricsService;
    }

    /**
     * Encodes `props` into a fresh container, runs `body` with it, and releases the container
     * when `body` returns or throws. Filling failures release it too.
     * @param props PropertyInput - Map to encode
     * @param body (nvl) => T - Consumer of the populated container, e.g. the external call
     * @returns T - Whatever `body` returns
     */
    public In<T>(props: PropertyInput, body: (nvl: NvlistHandle) => T): T {
        const nvl = this._alloc();
        try {
            this.Fill(nvl, props);
            this._metrics.IncEncode();
            return body(nvl);
        } finally {
            this._free(nvl);
        }
    }

    /**
     * Hands `body` an empty output slot. On normal exit `props` is cleared and refilled from the
     * container the callee stored in the slot; that container is released afterwards in every case,
     * including when decoding it fails.
     * @param props PropertyMap - Destination map
     * @param body (slot) => T - Call that may store a container in `slot.nvl`
     */
    public Out<T>(props: PropertyMap, body: (slot: NvlistSlot) => T): T {
        const slot: NvlistSlot = { nvl: null };
        try {
            const result = body(slot);
            props.clear();
            if (slot.nvl) {
                this.Decode(slot.nvl, props);
            }
            return result;
        } finally {
            if (slot.nvl) {
                // allocated by the callee, so not counted by _alloc / _free
                this.lib.Free(slot.nvl);
            }
        }
    }

    /**
     * Adds every entry of `props` to an existing container.
     * @throws NvlistTypeError for a value with no wire form, before that value reaches the library
     * @throws NvlistMemoryError when the library rejects an allocation or an add
     */
    public Fill(nvl: NvlistHandle, props: PropertyInput): void {
        for (const [key, value] of Entries(props)) {
            if (typeof key !== `string`) {
                throw new NvlistTypeError(ERROR_CODES.UNSUPPORTED_VALUE_TYPE, `Unsupported key type ${DescribeHostType(key)}`);
            }
            this._addValue(nvl, key, this._classify(key, value));
        }
    }

    /**
     * Reads a container into a map, in wire order. `into` is cleared first.
     * @param nvl NvlistHandle - Container to read; ownership stays with the caller
     * @param into PropertyMap - Destination (a new map when omitted)
     * @returns PropertyMap - The populated destination
     * @throws NvlistDecodeError when an accessor fails or an entry has no host form
     */
    public Decode(nvl: NvlistHandle, into: PropertyMap = new Map()): PropertyMap {
        into.clear();
        this._decodeInto(nvl, into);
        this._metrics.IncDecode();
        return into;
    }

    private _alloc(): NvlistHandle {
        const { status, nvl } = this.lib.Alloc(NV_UNIQUE_NAME);
        if (status !== 0 || !nvl) {
            log.debug(`nvlist_alloc failed with status ${status}`, FROM);
            throw new NvlistMemoryError(ERROR_CODES.ALLOC_FAILED, `nvlist_alloc failed`, status);
        }
        this._metrics.IncAllocated();
        return nvl;
    }

    private _free(nvl: NvlistHandle): void {
        this.lib.Free(nvl);
        this._metrics.IncFreed();
    }

    private _check(status: number, accessor: string, key: string): void {
        if (status !== 0) {
            throw new NvlistMemoryError(ERROR_CODES.ADD_FAILED, `${accessor} failed`, status, { key, accessor });
        }
    }

    private _integerKind(key: string): IntegerKind {
        return this._integerKeyTypes.get(key) ?? DEFAULT_INTEGER_KIND;
    }

    /** Sorts a host value into its wire variant, range-checking integers. */
    private _classify(key: string, value: PropertyValue): HostValue {
        if (value === null) {
            return { variant: `presence` };
        }
        if (typeof value === `boolean`) {
            return { variant: `boolean`, value, explicit: false };
        }
        if (typeof value === `string`) {
            return { variant: `string`, value };
        }
        if (typeof value === `number` || typeof value === `bigint`) {
            const kind = this._integerKind(key);
            return { variant: `integer`, kind, value: this._toWireInteger(key, kind, value), explicit: false };
        }
        if (value instanceof TypedValue) {
            if (value.kind === `boolean`) {
                if (typeof value.value !== `boolean`) {
                    throw new NvlistTypeError(ERROR_CODES.UNSUPPORTED_VALUE_TYPE, `boolean_t value must be a boolean`, {
                        key,
                    });
                }
                return { variant: `boolean`, value: value.value, explicit: true };
            }
            if (typeof value.value === `boolean`) {
                throw new NvlistTypeError(ERROR_CODES.UNSUPPORTED_VALUE_TYPE, `${value.kind} value must be an integer`, {
                    key,
                });
            }
            return {
                variant: `integer`,
                kind: value.kind,
                value: this._toWireInteger(key, value.kind, value.value),
                explicit: true,
            };
        }
        if (IsPropertyArray(value)) {
            return { variant: `array`, value };
        }
        if (value instanceof Map || IsPropertyRecord(value)) {
            return { variant: `map`, value };
        }
        throw new NvlistTypeError(
            ERROR_CODES.UNSUPPORTED_VALUE_TYPE,
            `Unsupported value type ${DescribeHostType(value)}`,
            { key },
        );
    }

    private _toWireInteger(key: string, kind: IntegerKind | `byte`, value: number | bigint): bigint {
        if (typeof value === `number` && !Number.isInteger(value)) {
            throw new NvlistTypeError(ERROR_CODES.UNSUPPORTED_VALUE_TYPE, `Unsupported value type number (not an integer)`, {
                key,
                value,
            });
        }
        if (typeof value === `number` && !Number.isSafeInteger(value)) {
            throw new NvlistTypeError(ERROR_CODES.VALUE_OUT_OF_RANGE, `Integer ${value} is not exact; pass a bigint`, {
                key,
                kind,
            });
        }
        const wide = BigInt(value);
        const [min, max] = INTEGER_RANGES[kind];
        if (wide < min || wide > max) {
            throw new NvlistTypeError(ERROR_CODES.VALUE_OUT_OF_RANGE, `Value ${wide} is out of range for ${kind}`, {
                key,
                kind,
            });
        }
        return wide;
    }

    private _addValue(nvl: NvlistHandle, key: string, host: HostValue): void {
        switch (host.variant) {
            case `presence`:
                this._check(this.lib.AddBoolean(nvl, key), `nvlist_add_boolean`, key);
                return;
            case `boolean`:
                this._check(
                    this.lib.Add(nvl, key, { kind: `boolean_value`, value: host.value }),
                    AccessorName(`add`, `boolean_value`, false),
                    key,
                );
                return;
            case `string`:
                this._check(this.lib.Add(nvl, key, { kind: `string`, value: host.value }), AccessorName(`add`, `string`, false), key);
                return;
            case `integer`:
                this._check(
                    this.lib.Add(nvl, key, IntegerDatum(host.kind, host.value)),
                    AccessorName(`add`, host.kind, false),
                    key,
                );
                return;
            case `map`: {
                // the parent keeps its own copy, the sub-container is ours to release
                const sub = this._alloc();
                try {
                    this.Fill(sub, host.value);
                    this._check(this.lib.Add(nvl, key, { kind: `nvlist`, value: sub }), AccessorName(`add`, `nvlist`, false), key);
                } finally {
                    this._free(sub);
                }
                return;
            }
            case `array`:
                this._addArray(nvl, key, host.value);
                return;
        }
    }

    private _addArray(nvl: NvlistHandle, key: string, array: readonly PropertyValue[]): void {
        if (array.length === 0) {
            throw new NvlistTypeError(ERROR_CODES.UNSUPPORTED_VALUE_TYPE, `Unsupported value type: empty array has no element type`, {
                key,
            });
        }
        const elements = array.map(element => {
            return this._classify(key, element);
        });
        const specimen = elements[0];
        const signature = Signature(specimen);
        elements.forEach((element, index) => {
            if (Signature(element) !== signature) {
                throw new NvlistTypeError(
                    ERROR_CODES.TYPE_MISMATCH,
                    `Array has elements of different types: ${signature} and ${Signature(element)}`,
                    { key, index, expected: signature, found: Signature(element) },
                );
            }
        });

        switch (specimen.variant) {
            case `boolean`: {
                const values: boolean[] = [];
                for (const element of elements) {
                    if (element.variant === `boolean`) {
                        values.push(element.value);
                    }
                }
                this._check(this.lib.AddArray(nvl, key, { kind: `boolean_value`, values }), AccessorName(`add`, `boolean_value`, true), key);
                return;
            }
            case `string`: {
                const values: string[] = [];
                for (const element of elements) {
                    if (element.variant === `string`) {
                        values.push(element.value);
                    }
                }
                this._check(this.lib.AddArray(nvl, key, { kind: `string`, values }), AccessorName(`add`, `string`, true), key);
                return;
            }
            case `integer`: {
                const values: bigint[] = [];
                for (const element of elements) {
                    if (element.variant === `integer`) {
                        values.push(element.value);
                    }
                }
                this._check(
                    this.lib.AddArray(nvl, key, IntegerArrayDatum(specimen.kind, values)),
                    AccessorName(`add`, specimen.kind, true),
                    key,
                );
                return;
            }
            case `map`: {
                const maps: PropertyInput[] = [];
                for (const element of elements) {
                    if (element.variant === `map`) {
                        maps.push(element.value);
                    }
                }
                this._addMapArray(nvl, key, maps);
                return;
            }
            case `presence`:
            case `array`:
                throw new NvlistTypeError(
                    ERROR_CODES.UNSUPPORTED_VALUE_TYPE,
                    `Unsupported array element type ${specimen.variant === `presence` ? `null` : `array`}`,
                    { key },
                );
        }
    }

    /**
     * Arrays of maps need one sub-container per element. All of them are allocated up front and
     * tracked in `owned`, so a single pass in `finally` releases whatever exists when an
     * allocation, a nested fill or the final add fails.
     */
    private _addMapArray(nvl: NvlistHandle, key: string, maps: PropertyInput[]): void {
        const owned: NvlistHandle[] = [];
        try {
            for (let i = 0; i < maps.length; i++) {
                owned.push(this._alloc());
            }
            maps.forEach((map, index) => {
                this.Fill(owned[index], map);
            });
            this._check(this.lib.AddArray(nvl, key, { kind: `nvlist`, values: owned }), AccessorName(`add`, `nvlist`, true), key);
        } finally {
            for (const sub of owned) {
                this._free(sub);
            }
        }
    }

    private _decodeInto(nvl: NvlistHandle, into: PropertyMap): void {
        let pair = this.lib.NextPair(nvl, null);
        while (pair !== null) {
            const name = this.lib.PairName(pair);
            into.set(name, this._decodePair(pair, name));
            pair = this.lib.NextPair(nvl, pair);
        }
    }

    private _decodePair(pair: NvpairHandle, name: string): PropertyValue {
        const tag = this.lib.PairType(pair);
        const tagInfo = LookupDataType(tag);
        if (!tagInfo) {
            log.debug(`entry '${name}' has unsupported type tag ${tag}`, FROM);
            throw new NvlistDecodeError(`Unsupported type tag ${tag} for entry '${name}'`, { name, tag });
        }
        if (tagInfo.presence) {
            return null;
        }
        const { info } = tagInfo;
        const isArray = this.lib.PairIsArray(pair);
        if (isArray !== tagInfo.isArray) {
            throw new NvlistDecodeError(`Entry '${name}' array flag disagrees with type tag ${tag}`, { name, tag });
        }
        if (!isArray) {
            const read = this.lib.Value(pair, info.kind);
            if (read.status !== 0 || !read.result) {
                return this._readFailed(info, false, name, read.status);
            }
            return this._convert(info, read.result.value, name);
        }
        const read = this.lib.ArrayValue(pair, info.kind);
        if (read.status !== 0 || !read.result || read.result.values.length < read.count) {
            return this._readFailed(info, true, name, read.status);
        }
        const raw: WireScalar[] = read.result.values;
        const values: PropertyValue[] = [];
        for (let i = 0; i < read.count; i++) {
            values.push(this._convert(info, raw[i], name));
        }
        return values;
    }

    private _readFailed(info: TypeInfo, isArray: boolean, name: string, status: number): never {
        const accessor = AccessorName(`value`, info.kind, isArray);
        log.debug(`${accessor} failed for '${name}' with status ${status}`, FROM);
        throw new NvlistDecodeError(`${accessor} failed`, { name, status });
    }

    private _convert(info: TypeInfo, raw: WireScalar, name: string): PropertyValue {
        const converted = info.convert(raw);
        if (converted === undefined) {
            throw new NvlistDecodeError(`Entry '${name}' carries a payload that is not ${info.kind}`, { name });
        }
        if (converted instanceof NvlistHandle) {
            const nested: PropertyMap = new Map();
            this._decodeInto(converted, nested);
            return nested;
        }
        return converted;
    }
}
