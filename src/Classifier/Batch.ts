/**
 * Per-item error lists of batch operations.
 */
import { ValidationError } from '../Common/Errors.js';
import type { PropertyMap } from '../Domain/Property.js';
import type { MultipleFailure, MultipleFailureClass, ZfsError } from './Failures.js';

/** Key under which the library reports how many failures it left out of the list. */
export const MORE_ERRORS_KEY = `N_MORE_ERRORS`;

/**
 * Item name → status, in report order, plus the count of failures not enumerated.
 * @example
 * const items: ItemErrorMap = { errors: new Map([['tank/a@s1', 17]]), suppressedCount: 4 };
 */
export interface ItemErrorMap {
    errors: Map<string, number>;
    suppressedCount: number;
}

/** Classifies one item's status; `name` is null for list-level failures. */
export type ItemMapper = (status: number, name: string | null) => ZfsError;

function ToStatus(key: string, value: unknown): number {
    if (typeof value === `bigint`) {
        return Number(value);
    }
    if (typeof value === `number` && Number.isInteger(value)) {
        return value;
    }
    throw new ValidationError(`Error list entry '${key}' is not a status code`, { key });
}

/**
 * Splits a decoded error list into statuses and the suppressed count. A missing count means zero.
 * @param map PropertyMap - Error list as decoded from the library's output container
 */
export function ParseItemErrors(map: PropertyMap): ItemErrorMap {
    const errors = new Map<string, number>();
    let suppressedCount = 0;
    for (const [key, value] of map) {
        if (key === MORE_ERRORS_KEY) {
            suppressedCount = ToStatus(key, value);
            continue;
        }
        errors.set(key, ToStatus(key, value));
    }
    return { errors, suppressedCount };
}

/**
 * Builds the batch failure for a non-zero status.
 *
 * With an empty item map the aggregate status is classified once, against the only requested name
 * when exactly one was requested and against no name otherwise; a suppressed count reported
 * without any items is kept. With a populated map every item is
 * classified against its own name. Both paths produce the same outer failure.
 * @param status number - Aggregate status of the call
 * @param items ItemErrorMap - Per-item statuses
 * @param names readonly string[] - Names the request addressed
 * @param Failure MultipleFailureClass - Batch failure to raise
 * @param mapper ItemMapper - Per-item classifier
 */
export function HandleErrorList(
    status: number,
    items: ItemErrorMap,
    names: readonly string[],
    Failure: MultipleFailureClass,
    mapper: ItemMapper,
): MultipleFailure {
    if (items.errors.size === 0) {
        const name = names.length === 1 ? names[0] : null;
        return new Failure([mapper(status, name)], items.suppressedCount);
    }
    const errors: ZfsError[] = [];
    for (const [name, itemStatus] of items.errors) {
        errors.push(mapper(itemStatus, name));
    }
    return new Failure(errors, items.suppressedCount);
}
