/**
 * Naming grammar of datasets, snapshots and bookmarks.
 *
 * A filesystem name is one or more `/`-separated components; a snapshot is `fs@component`,
 * a bookmark is `fs#component`. Components are non-empty and drawn from letters, digits and `-_.: `.
 */

/** Maximum length of any name. */
export const MAXNAMELEN = 255;

const COMPONENT_PATTERN = /^[A-Za-z0-9\-_.: ]+$/;

/**
 * @example
 * IsValidNameComponent('fs-1'); // true
 * IsValidNameComponent(''); // false
 */
export function IsValidNameComponent(component: string): boolean {
    return COMPONENT_PATTERN.test(component);
}

/**
 * @example
 * IsValidFsName('pool/fs'); // true
 * IsValidFsName('pool//fs'); // false
 */
export function IsValidFsName(name: string): boolean {
    return (
        name.length > 0 &&
        name.split(`/`).every(component => {
            return IsValidNameComponent(component);
        })
    );
}

function IsValidSuffixedName(name: string, separator: string): boolean {
    const parts = name.split(separator);
    return parts.length === 2 && IsValidFsName(parts[0]) && IsValidNameComponent(parts[1]);
}

/**
 * @example
 * IsValidSnapName('pool/fs@snap'); // true
 */
export function IsValidSnapName(name: string): boolean {
    return IsValidSuffixedName(name, `@`);
}

/**
 * @example
 * IsValidBookmarkName('pool/fs#mark'); // true
 */
export function IsValidBookmarkName(name: string): boolean {
    return IsValidSuffixedName(name, `#`);
}

/** True when the name exceeds MAXNAMELEN. */
export function IsTooLong(name: string): boolean {
    return name.length > MAXNAMELEN;
}

/**
 * Leading pool segment, up to the first `/`, `@` or `#`.
 * @example
 * PoolName('tank/fs@snap'); // 'tank'
 */
export function PoolName(name: string): string {
    return name.split(/[/@#]/, 1)[0];
}

/**
 * Dataset part of a snapshot or bookmark name.
 * @example
 * FsName('tank/fs#mark'); // 'tank/fs'
 */
export function FsName(name: string): string {
    return name.split(/[@#]/, 1)[0];
}

/** True when every name shares the pool of the first one. */
export function SamePool(names: readonly string[]): boolean {
    if (names.length === 0) {
        return true;
    }
    const pool = PoolName(names[0]);
    return names.every(name => {
        return PoolName(name) === pool;
    });
}
