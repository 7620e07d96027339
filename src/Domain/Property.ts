/**
 * Host-side property values exchanged with the management library.
 * @example
 * const props: PropertyMap = new Map([['compression', 'lz4'], ['quota', 1024 ** 3]]);
 */
import type { IntegerKind } from './Wire.js';

/** Explicitly typed scalar kinds: sized integers, the byte type and boolean_t. */
export type TypedKind = IntegerKind | `byte` | `boolean`;

/**
 * A scalar whose wire type is fixed by the caller instead of inferred from the host value.
 * @example
 * const flags = uint32(7);
 */
export class TypedValue {
    /**
     * @param kind TypedKind - Wire type the value is written as
     * @param value number | bigint | boolean - Host value, range-checked on encode
     */
    constructor(
        public readonly kind: TypedKind,
        public readonly value: number | bigint | boolean,
    ) {}
}

/** Scalars: `null` is a presence-only flag, plain integers default to uint64. */
export type PropertyScalar = null | boolean | string | number | bigint | TypedValue;

/** Plain-object form of a property map, accepted on encode. */
export interface PropertyRecord {
    [key: string]: PropertyValue;
}

/** Ordered property map; decode always produces this form. */
export interface PropertyMap extends Map<string, PropertyValue> {}

/** Any value that can be stored under a property key. */
export type PropertyValue = PropertyScalar | PropertyMap | PropertyRecord | readonly PropertyValue[];

/** Either map form. */
export type PropertyInput = PropertyMap | PropertyRecord;

export function int8(value: number | bigint): TypedValue {
    return new TypedValue(`int8`, value);
}

export function uint8(value: number | bigint): TypedValue {
    return new TypedValue(`uint8`, value);
}

export function int16(value: number | bigint): TypedValue {
    return new TypedValue(`int16`, value);
}

export function uint16(value: number | bigint): TypedValue {
    return new TypedValue(`uint16`, value);
}

export function int32(value: number | bigint): TypedValue {
    return new TypedValue(`int32`, value);
}

export function uint32(value: number | bigint): TypedValue {
    return new TypedValue(`uint32`, value);
}

export function int64(value: number | bigint): TypedValue {
    return new TypedValue(`int64`, value);
}

export function uint64(value: number | bigint): TypedValue {
    return new TypedValue(`uint64`, value);
}

/** Unsigned char (0..255). */
export function byte(value: number): TypedValue {
    return new TypedValue(`byte`, value);
}

/** boolean_t; written with the boolean_value accessor, or boolean_array inside arrays. */
export function booleanT(value: boolean): TypedValue {
    return new TypedValue(`boolean`, value);
}
