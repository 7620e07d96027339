/**
 * In-process implementation of the container library.
 *
 * Follows the external library's contract: entries keep insertion order, a unique-name list replaces
 * an existing entry of the same name (the new entry goes last), nested lists are copied on add and
 * owned by their parent afterwards, and reads of the wrong kind fail with EINVAL.
 */
import { InternalError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { Errno } from '../Domain/Errno.js';
import {
    DataType,
    NV_UNIQUE_NAME,
    NvlistHandle,
    NvpairHandle,
    type AllocResult,
    type ElementKind,
    type NvpairLibrary,
    type WireArrayDatum,
    type WireArrayRead,
    type WireDatum,
    type WireRead,
    type WireScalar,
} from '../Domain/Wire.js';
import { INTEGER_RANGES, TYPE_TABLE } from './TypeRegistry.js';

const FROM = log.Helper_LocationBuilder(`Nvlist`, `MemoryNvpair`);

type StoredValue =
    | { presence: true }
    | { presence: false; isArray: false; datum: WireDatum }
    | { presence: false; isArray: true; datum: WireArrayDatum };

interface StoredPair {
    address: number;
    name: string;
    value: StoredValue;
}

interface ListState {
    address: number;
    flags: number;
    embedded: boolean; // owned by a parent entry, released with it
    pairs: StoredPair[];
}

function CopyArray<D extends WireArrayDatum>(datum: D): D {
    return { ...datum, values: [...datum.values] };
}

/** Checks a non-container payload against its kind's host type and range. */
function IsValidPayload(kind: ElementKind, value: WireScalar): boolean {
    switch (kind) {
        case `boolean_value`:
            return typeof value === `boolean`;
        case `string`:
            return typeof value === `string`;
        case `nvlist`:
            return value instanceof NvlistHandle;
        case `int64`:
        case `uint64`: {
            const [min, max] = INTEGER_RANGES[kind];
            return typeof value === `bigint` && value >= min && value <= max;
        }
        default: {
            const [min, max] = INTEGER_RANGES[kind];
            return typeof value === `number` && Number.isInteger(value) && BigInt(value) >= min && BigInt(value) <= max;
        }
    }
}

export class MemoryNvpair implements NvpairLibrary {
    private _lists: Map<number, ListState> = new Map();
    private _pairs: Map<number, { list: ListState; pair: StoredPair }> = new Map();
    private _nextAddress: number = 0x1000;

    /** Number of live containers allocated through Alloc and not yet freed. */
    public Outstanding(): number {
        let count = 0;
        for (const list of this._lists.values()) {
            if (!list.embedded) {
                count++;
            }
        }
        return count;
    }

    public Alloc(flags: number): AllocResult {
        const list = this._newList(flags, false);
        return { status: 0, nvl: new NvlistHandle(list.address) };
    }

    /**
     * Releases a container and everything embedded in it.
     * @throws InternalError on a handle that is not live or that belongs to a parent entry
     */
    public Free(nvl: NvlistHandle): void {
        const list = this._lists.get(nvl.address);
        if (!list) {
            log.error(`free of container ${nvl.address} which is not live`, FROM);
            throw new InternalError(`nvlist_free on a container that is not live`, { address: nvl.address });
        }
        if (list.embedded) {
            throw new InternalError(`nvlist_free on a container owned by its parent`, { address: nvl.address });
        }
        this._release(list);
    }

    public AddBoolean(nvl: NvlistHandle, name: string): number {
        const list = this._lists.get(nvl.address);
        if (!list) {
            return Errno.EINVAL;
        }
        this._append(list, name, { presence: true });
        return 0;
    }

    public Add(nvl: NvlistHandle, name: string, datum: WireDatum): number {
        const list = this._lists.get(nvl.address);
        if (!list || !IsValidPayload(datum.kind, datum.value)) {
            return Errno.EINVAL;
        }
        let stored: WireDatum = datum;
        if (datum.kind === `nvlist`) {
            const source = this._lists.get(datum.value.address);
            if (!source) {
                return Errno.EINVAL;
            }
            stored = { kind: `nvlist`, value: new NvlistHandle(this._clone(source).address) };
        }
        this._append(list, name, { presence: false, isArray: false, datum: stored });
        return 0;
    }

    public AddArray(nvl: NvlistHandle, name: string, datum: WireArrayDatum): number {
        const list = this._lists.get(nvl.address);
        if (!list) {
            return Errno.EINVAL;
        }
        const values: WireScalar[] = datum.values;
        if (!values.every(value => IsValidPayload(datum.kind, value))) {
            return Errno.EINVAL;
        }
        let stored: WireArrayDatum = CopyArray(datum);
        if (datum.kind === `nvlist`) {
            const sources: ListState[] = [];
            for (const handle of datum.values) {
                const source = this._lists.get(handle.address);
                if (!source) {
                    return Errno.EINVAL;
                }
                sources.push(source);
            }
            stored = {
                kind: `nvlist`,
                values: sources.map(source => {
                    return new NvlistHandle(this._clone(source).address);
                }),
            };
        }
        this._append(list, name, { presence: false, isArray: true, datum: stored });
        return 0;
    }

    public NextPair(nvl: NvlistHandle, previous: NvpairHandle | null): NvpairHandle | null {
        const list = this._lists.get(nvl.address);
        if (!list) {
            return null;
        }
        let index = 0;
        if (previous) {
            index = list.pairs.findIndex(pair => {
                return pair.address === previous.address;
            });
            if (index < 0) {
                return null;
            }
            index++;
        }
        const next = list.pairs[index];
        return next ? new NvpairHandle(next.address) : null;
    }

    public PairName(pair: NvpairHandle): string {
        return this._pair(pair).name;
    }

    public PairType(pair: NvpairHandle): DataType {
        const { value } = this._pair(pair);
        if (value.presence) {
            return DataType.BOOLEAN;
        }
        const info = TYPE_TABLE[value.datum.kind];
        return value.isArray ? info.arrayType : info.scalarType;
    }

    public PairIsArray(pair: NvpairHandle): boolean {
        const { value } = this._pair(pair);
        return !value.presence && value.isArray;
    }

    public Value(pair: NvpairHandle, kind: ElementKind): WireRead<WireDatum> {
        const entry = this._pairs.get(pair.address);
        if (!entry) {
            return { status: Errno.EINVAL };
        }
        const { value } = entry.pair;
        if (value.presence || value.isArray || value.datum.kind !== kind) {
            return { status: Errno.EINVAL };
        }
        return { status: 0, result: value.datum };
    }

    public ArrayValue(pair: NvpairHandle, kind: ElementKind): WireArrayRead {
        const entry = this._pairs.get(pair.address);
        if (!entry) {
            return { status: Errno.EINVAL, count: 0 };
        }
        const { value } = entry.pair;
        if (value.presence || !value.isArray || value.datum.kind !== kind) {
            return { status: Errno.EINVAL, count: 0 };
        }
        return { status: 0, count: value.datum.values.length, result: CopyArray(value.datum) };
    }

    private _pair(pair: NvpairHandle): StoredPair {
        const entry = this._pairs.get(pair.address);
        if (!entry) {
            throw new InternalError(`nvpair handle is not live`, { address: pair.address });
        }
        return entry.pair;
    }

    private _newList(flags: number, embedded: boolean): ListState {
        const list: ListState = { address: this._nextAddress++, flags, embedded, pairs: [] };
        this._lists.set(list.address, list);
        return list;
    }

    private _append(list: ListState, name: string, value: StoredValue): void {
        if (list.flags & NV_UNIQUE_NAME) {
            const existing = list.pairs.findIndex(pair => {
                return pair.name === name;
            });
            if (existing >= 0) {
                const [removed] = list.pairs.splice(existing, 1);
                this._releasePair(removed);
            }
        }
        const pair: StoredPair = { address: this._nextAddress++, name, value };
        list.pairs.push(pair);
        this._pairs.set(pair.address, { list, pair });
    }

    /** Deep copy of a list as an embedded container. */
    private _clone(source: ListState): ListState {
        const copy = this._newList(source.flags, true);
        for (const pair of source.pairs) {
            this._append(copy, pair.name, this._cloneValue(pair.value));
        }
        return copy;
    }

    private _cloneValue(value: StoredValue): StoredValue {
        if (value.presence) {
            return value;
        }
        if (value.isArray) {
            const { datum } = value;
            if (datum.kind === `nvlist`) {
                return {
                    presence: false,
                    isArray: true,
                    datum: {
                        kind: `nvlist`,
                        values: datum.values.map(handle => {
                            return new NvlistHandle(this._clone(this._embedded(handle)).address);
                        }),
                    },
                };
            }
            return { presence: false, isArray: true, datum: CopyArray(datum) };
        }
        const { datum } = value;
        if (datum.kind === `nvlist`) {
            return {
                presence: false,
                isArray: false,
                datum: { kind: `nvlist`, value: new NvlistHandle(this._clone(this._embedded(datum.value)).address) },
            };
        }
        return value;
    }

    private _embedded(handle: NvlistHandle): ListState {
        const list = this._lists.get(handle.address);
        if (!list) {
            throw new InternalError(`embedded nvlist is not live`, { address: handle.address });
        }
        return list;
    }

    private _release(list: ListState): void {
        for (const pair of list.pairs) {
            this._releasePair(pair);
        }
        list.pairs = [];
        this._lists.delete(list.address);
    }

    private _releasePair(pair: StoredPair): void {
        this._pairs.delete(pair.address);
        const { value } = pair;
        if (value.presence) {
            return;
        }
        const handles: NvlistHandle[] = [];
        if (value.isArray && value.datum.kind === `nvlist`) {
            handles.push(...value.datum.values);
        } else if (!value.isArray && value.datum.kind === `nvlist`) {
            handles.push(value.datum.value);
        }
        for (const handle of handles) {
            const nested = this._lists.get(handle.address);
            if (nested) {
                this._release(nested);
            }
        }
    }
}
