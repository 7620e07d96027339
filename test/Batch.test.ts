import { describe, it, expect, vi } from 'vitest';
import { ValidationError } from '../src/Common/Errors.js';
import { HandleErrorList, ParseItemErrors, type ItemErrorMap } from '../src/Classifier/Batch.js';
import { NameInvalid, SnapshotExists, SnapshotFailure, type ZfsError } from '../src/Classifier/Failures.js';
import { Errno } from '../src/Domain/Errno.js';
import type { PropertyValue } from '../src/Domain/Property.js';

const EMPTY: ItemErrorMap = { errors: new Map(), suppressedCount: 0 };

function Exists(status: number, name: string | null): ZfsError {
    return status === Errno.EEXIST ? new SnapshotExists(name) : new NameInvalid(name);
}

describe('Batch', () => {
    describe('ParseItemErrors', () => {
        it('pops the suppressed count', () => {
            const items = ParseItemErrors(
                new Map<string, PropertyValue>([
                    ['pool/a@s1', Errno.EEXIST],
                    ['N_MORE_ERRORS', 4],
                ]),
            );
            expect(items.errors).toEqual(new Map([['pool/a@s1', Errno.EEXIST]]));
            expect(items.suppressedCount).toBe(4);
        });

        it('treats a missing count as zero', () => {
            expect(ParseItemErrors(new Map<string, PropertyValue>([['pool/a@s1', Errno.EBUSY]])).suppressedCount).toBe(0);
        });

        it('accepts 64-bit statuses', () => {
            expect(ParseItemErrors(new Map<string, PropertyValue>([['pool/a@s1', 16n]])).errors.get('pool/a@s1')).toBe(16);
        });

        it('rejects entries that are not status codes', () => {
            expect(() => ParseItemErrors(new Map<string, PropertyValue>([['pool/a@s1', 'busy']]))).toThrow(ValidationError);
        });
    });

    describe('HandleErrorList', () => {
        it('classifies the aggregate status against the single requested name', () => {
            const mapper = vi.fn(Exists);
            const failure = HandleErrorList(Errno.EEXIST, EMPTY, ['pool/a@s1'], SnapshotFailure, mapper);
            expect(mapper).toHaveBeenCalledWith(Errno.EEXIST, 'pool/a@s1');
            expect(failure).toBeInstanceOf(SnapshotFailure);
            expect(failure.errors).toHaveLength(1);
            expect(failure.suppressedCount).toBe(0);
        });

        it('keeps a suppressed count reported without any items', () => {
            const items = ParseItemErrors(new Map<string, PropertyValue>([['N_MORE_ERRORS', 4]]));
            const failure = HandleErrorList(Errno.EEXIST, items, ['pool/a@s1', 'pool/b@s1'], SnapshotFailure, Exists);
            expect(failure.errors).toHaveLength(1);
            expect(failure.errors[0].target).toBeNull();
            expect(failure.suppressedCount).toBe(4);
        });

        it('classifies against no name when several were requested', () => {
            const mapper = vi.fn(Exists);
            HandleErrorList(Errno.EEXIST, EMPTY, ['pool/a@s1', 'pool/b@s1'], SnapshotFailure, mapper);
            expect(mapper).toHaveBeenCalledWith(Errno.EEXIST, null);
        });

        it('classifies each item against its own name in report order', () => {
            const items: ItemErrorMap = {
                errors: new Map([
                    ['pool/b@s1', Errno.EINVAL],
                    ['pool/a@s1', Errno.EEXIST],
                ]),
                suppressedCount: 4,
            };
            const failure = HandleErrorList(Errno.EEXIST, items, ['pool/a@s1', 'pool/b@s1'], SnapshotFailure, Exists);
            expect(
                failure.errors.map(error => {
                    return [error.constructor.name, error.target];
                }),
            ).toEqual([
                ['NameInvalid', 'pool/b@s1'],
                ['SnapshotExists', 'pool/a@s1'],
            ]);
            expect(failure.suppressedCount).toBe(4);
            expect(failure.errno).toBe(Errno.EINVAL);
        });

        it('classifies a one-item report like the aggregate status', () => {
            const aggregate = HandleErrorList(Errno.EEXIST, EMPTY, ['pool/a@s1'], SnapshotFailure, Exists);
            const itemized = HandleErrorList(
                Errno.EEXIST,
                { errors: new Map([['pool/a@s1', Errno.EEXIST]]), suppressedCount: 0 },
                ['pool/a@s1'],
                SnapshotFailure,
                Exists,
            );
            expect(itemized.errors[0]).toEqual(aggregate.errors[0]);
            expect(itemized.code).toBe(aggregate.code);
        });
    });
});
