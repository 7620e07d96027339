import { describe, it, expect } from 'vitest';
import type { ItemErrorMap } from '../src/Classifier/Batch.js';
import {
    BadHoldCleanupFD,
    BadStream,
    BookmarkFailure,
    BookmarkMismatch,
    BookmarkNotSupported,
    DatasetNotFound,
    DuplicateSnapshots,
    FeatureNotSupported,
    FilesystemExists,
    FilesystemNotFound,
    GenericFailure,
    HoldFailure,
    HoldNotFound,
    HoldReleaseFailure,
    NameInvalid,
    NameTooLong,
    NoSpace,
    ParentNotFound,
    PoolsDiffer,
    PropertyInvalid,
    ReadOnlyPool,
    SnapshotExists,
    SnapshotFailure,
    SnapshotIsCloned,
    SnapshotIsHeld,
    SnapshotMismatch,
    SnapshotNotFound,
    StreamFeatureNotSupported,
    MultipleFailure,
    type ZfsError,
} from '../src/Classifier/Failures.js';
import {
    ClassifyBookmark,
    ClassifyClone,
    ClassifyCreate,
    ClassifyDestroyBookmarks,
    ClassifyDestroySnaps,
    ClassifyGetBookmarks,
    ClassifyGetHolds,
    ClassifyHold,
    ClassifyReceive,
    ClassifyRelease,
    ClassifyRollback,
    ClassifySend,
    ClassifySendSpace,
    ClassifySnaprangeSpace,
    ClassifySnapshot,
} from '../src/Classifier/Operations.js';
import { ERROR_CODES } from '../src/Common/Errors.js';
import { Errno } from '../src/Domain/Errno.js';

const EMPTY: ItemErrorMap = { errors: new Map(), suppressedCount: 0 };
const LONG_TAG = 't'.repeat(256);

function Items(entries: [string, number][], suppressedCount: number = 0): ItemErrorMap {
    return { errors: new Map(entries), suppressedCount };
}

/** The single per-item failure of a batch failure. */
function Only(failure: ZfsError): ZfsError {
    if (!(failure instanceof MultipleFailure)) {
        throw new Error(`expected a batch failure, got ${failure.constructor.name}`);
    }
    expect(failure.errors).toHaveLength(1);
    return failure.errors[0];
}

describe('Operations', () => {
    describe('name checks', () => {
        it('accepts a plain filesystem name and blames the settings', () => {
            const failure = ClassifyCreate(Errno.EINVAL, 'pool/fs');
            expect(failure).toBeInstanceOf(PropertyInvalid);
            expect(failure.target).toBe('pool/fs');
        });

        it('reports malformed names as invalid', () => {
            expect(ClassifyCreate(Errno.EINVAL, 'pool//fs')).toBeInstanceOf(NameInvalid);
            expect(ClassifyCreate(Errno.EINVAL, '')).toBeInstanceOf(NameInvalid);
        });

        it('reports a 256 character name as too long', () => {
            const failure = ClassifyCreate(Errno.EINVAL, 'p/' + 'a'.repeat(254));
            expect(failure).toBeInstanceOf(NameTooLong);
            expect(failure.code).toBe(ERROR_CODES.NAME_TOO_LONG);
        });

        it('checks length before falling back to the settings', () => {
            expect(ClassifyCreate(Errno.EINVAL, 'pool/' + 'x'.repeat(295))).toBeInstanceOf(NameTooLong);
        });
    });

    describe('create', () => {
        it('maps the status table', () => {
            expect(ClassifyCreate(Errno.EEXIST, 'pool/fs')).toBeInstanceOf(FilesystemExists);
            expect(ClassifyCreate(Errno.ENOENT, 'pool/fs')).toBeInstanceOf(ParentNotFound);
        });

        it('wraps unknown statuses with the operation description', () => {
            const failure = ClassifyCreate(Errno.EIO, 'pool/fs');
            expect(failure).toBeInstanceOf(GenericFailure);
            expect(failure.errno).toBe(Errno.EIO);
            expect(failure.message).toBe('Failed to create filesystem (EIO): pool/fs');
        });
    });

    describe('clone', () => {
        it('checks the origin after the clone name', () => {
            expect(ClassifyClone(Errno.EINVAL, 'pool/clone', 'pool/fs').target).toBe('pool/fs');
            expect(ClassifyClone(Errno.EINVAL, 'pool//clone', 'pool/fs').target).toBe('pool//clone');
        });

        it('reports clones across pools', () => {
            const failure = ClassifyClone(Errno.EINVAL, 'pool1/clone', 'pool2/fs@s');
            expect(failure).toBeInstanceOf(PoolsDiffer);
            expect(failure.target).toBe('pool1/clone');
        });

        it('maps a missing origin', () => {
            expect(ClassifyClone(Errno.ENOENT, 'pool/clone', 'pool/fs@s')).toBeInstanceOf(DatasetNotFound);
        });
    });

    describe('rollback', () => {
        it('treats an invalid argument on a good name as a missing snapshot', () => {
            expect(ClassifyRollback(Errno.EINVAL, 'pool/fs')).toBeInstanceOf(SnapshotNotFound);
        });

        it('separates bad names from missing filesystems', () => {
            expect(ClassifyRollback(Errno.ENOENT, 'pool//fs')).toBeInstanceOf(NameInvalid);
            expect(ClassifyRollback(Errno.ENOENT, 'pool/fs')).toBeInstanceOf(FilesystemNotFound);
        });

        it('wraps other statuses', () => {
            expect(ClassifyRollback(Errno.EIO, 'pool/fs').message).toBe('Failed to rollback (EIO): pool/fs');
        });
    });

    describe('snapshot', () => {
        it('keeps the suppressed count of a batch report', () => {
            const failure = ClassifySnapshot(Errno.EEXIST, Items([['pool/a@s1', Errno.EEXIST]], 4), ['pool/a@s1', 'pool/b@s1']);
            expect(failure).toBeInstanceOf(SnapshotFailure);
            expect(failure.suppressedCount).toBe(4);
            expect(failure.errors).toHaveLength(1);
            expect(failure.errors[0]).toBeInstanceOf(SnapshotExists);
            expect(failure.errors[0].target).toBe('pool/a@s1');
        });

        it('keeps a suppressed count reported without any items', () => {
            const failure = ClassifySnapshot(Errno.EEXIST, Items([], 4), ['pool/a@s1', 'pool/b@s1']);
            expect(failure.suppressedCount).toBe(4);
            expect(Only(failure)).toBeInstanceOf(SnapshotExists);
        });

        it('tells duplicate filesystems from different pools', () => {
            expect(Only(ClassifySnapshot(Errno.EXDEV, EMPTY, ['pool/a@s1']))).toBeInstanceOf(DuplicateSnapshots);
            const differ = Only(ClassifySnapshot(Errno.EXDEV, EMPTY, ['pool1/a@s1', 'pool2/a@s1']));
            expect(differ).toBeInstanceOf(PoolsDiffer);
            expect(differ.target).toBeNull();
        });

        it('blames any malformed snapshot in the request', () => {
            const failure = ClassifySnapshot(Errno.EINVAL, Items([['pool/a@s1', Errno.EINVAL]]), ['pool/a@s1', 'pool/b']);
            expect(Only(failure)).toBeInstanceOf(NameInvalid);
            expect(Only(failure).target).toBe('pool/a@s1');
        });

        it('falls back to the settings', () => {
            expect(Only(ClassifySnapshot(Errno.EINVAL, EMPTY, ['pool/a@s1']))).toBeInstanceOf(PropertyInvalid);
        });

        it('maps missing filesystems', () => {
            expect(Only(ClassifySnapshot(Errno.ENOENT, EMPTY, ['pool/a@s1']))).toBeInstanceOf(FilesystemNotFound);
        });
    });

    describe('destroy snapshots', () => {
        it('maps held and cloned snapshots', () => {
            const failure = ClassifyDestroySnaps(
                Errno.EBUSY,
                Items([
                    ['pool/a@s1', Errno.EBUSY],
                    ['pool/a@s2', Errno.EEXIST],
                ]),
                ['pool/a@s1', 'pool/a@s2'],
            );
            expect(failure.code).toBe(ERROR_CODES.SNAPSHOT_DESTRUCTION_FAILURE);
            expect(failure.errors[0]).toBeInstanceOf(SnapshotIsHeld);
            expect(failure.errors[1]).toBeInstanceOf(SnapshotIsCloned);
        });

        it('wraps other statuses per item', () => {
            const failure = ClassifyDestroySnaps(Errno.EIO, EMPTY, ['pool/a@s1']);
            expect(Only(failure).message).toBe('Failed to destroy snapshot (EIO): pool/a@s1');
        });
    });

    describe('bookmark', () => {
        it('reports a bookmark outside its snapshot filesystem', () => {
            const bookmarks = { 'pool/fs#mark': 'pool/other@snap' };
            const failure = ClassifyBookmark(Errno.EINVAL, Items([['pool/fs#mark', Errno.EINVAL]]), bookmarks);
            expect(failure).toBeInstanceOf(BookmarkFailure);
            expect(Only(failure)).toBeInstanceOf(BookmarkMismatch);
            expect(Only(failure).target).toBe('pool/fs#mark');
        });

        it('checks the bookmark name, then the source snapshot', () => {
            const badName = ClassifyBookmark(Errno.EINVAL, Items([['pool/fs@mark', Errno.EINVAL]]), { 'pool/fs@mark': 'pool/fs@s' });
            expect(Only(badName)).toBeInstanceOf(NameInvalid);
            expect(Only(badName).target).toBe('pool/fs@mark');
            const badSource = ClassifyBookmark(Errno.EINVAL, Items([['pool/fs#m', Errno.EINVAL]]), { 'pool/fs#m': 'pool/fs' });
            expect(Only(badSource).target).toBe('pool/fs');
        });

        it('reports bookmarks across pools', () => {
            const bookmarks = { 'pool/fs#m': 'pool/fs@s', 'other/fs#m2': 'other/fs@s' };
            const failure = ClassifyBookmark(Errno.EINVAL, Items([['pool/fs#m', Errno.EINVAL]]), bookmarks);
            expect(Only(failure)).toBeInstanceOf(PoolsDiffer);
        });

        it('scans the request for a list-level failure', () => {
            const bookmarks = { 'pool/fs#a': 'pool/fs@a', 'pool/fs@b': 'pool/fs@b' };
            const failure = ClassifyBookmark(Errno.EINVAL, EMPTY, bookmarks);
            expect(Only(failure)).toBeInstanceOf(NameInvalid);
            expect(Only(failure).target).toBe('pool/fs@b');
        });

        it('maps the status table', () => {
            const bookmarks = { 'pool/fs#a': 'pool/fs@a' };
            expect(Only(ClassifyBookmark(Errno.ENOTSUP, EMPTY, bookmarks))).toBeInstanceOf(BookmarkNotSupported);
            expect(Only(ClassifyBookmark(Errno.ENOENT, EMPTY, bookmarks)).target).toBe('pool/fs#a');
        });

        it('lists and destroys bookmarks', () => {
            expect(ClassifyGetBookmarks(Errno.ENOENT, 'pool/fs')).toBeInstanceOf(FilesystemNotFound);
            expect(ClassifyGetBookmarks(Errno.EIO, 'pool/fs').message).toBe('Failed to list bookmarks (EIO): pool/fs');
            const failure = ClassifyDestroyBookmarks(Errno.EINVAL, Items([['pool/fs#a', Errno.EINVAL]]), ['pool/fs#a']);
            expect(failure.code).toBe(ERROR_CODES.BOOKMARK_DESTRUCTION_FAILURE);
            expect(Only(failure)).toBeInstanceOf(NameInvalid);
        });
    });

    describe('snapshot range space', () => {
        it('reports a cross-pool range against the last snapshot', () => {
            const failure = ClassifySnaprangeSpace(Errno.EINVAL, 'pool1/fs@s1', 'pool2/fs@s2');
            expect(failure).toBeInstanceOf(PoolsDiffer);
            expect(failure.target).toBe('pool2/fs@s2');
        });

        it('reports unrelated snapshots of one pool as a mismatch', () => {
            expect(ClassifySnaprangeSpace(Errno.EINVAL, 'pool/a@s1', 'pool/b@s2')).toBeInstanceOf(SnapshotMismatch);
        });

        it('checks the first snapshot before the last', () => {
            expect(ClassifySnaprangeSpace(Errno.EINVAL, 'pool/a', 'pool/b').target).toBe('pool/a');
        });
    });

    describe('hold', () => {
        it('reports a bad cleanup descriptor outside the batch', () => {
            const failure = ClassifyHold(Errno.EBADF, EMPTY, { 'pool/fs@s': 'tag' });
            expect(failure).toBeInstanceOf(BadHoldCleanupFD);
            expect(failure.target).toBeNull();
        });

        it('derives the target from the failing item', () => {
            const holds = { 'pool/fs@s': 'tag' };
            const missing = ClassifyHold(Errno.ENOENT, Items([['pool/fs@s', Errno.ENOENT]]), holds);
            expect(missing).toBeInstanceOf(HoldFailure);
            expect(Only(missing)).toBeInstanceOf(FilesystemNotFound);
            expect(Only(missing).target).toBe('pool/fs');
            expect(Only(ClassifyHold(Errno.ENOTSUP, Items([['pool/fs@s', Errno.ENOTSUP]]), holds)).target).toBe('pool');
        });

        it('reports an overlong tag', () => {
            const holds = { 'pool/fs@s': LONG_TAG };
            expect(Only(ClassifyHold(Errno.E2BIG, Items([['pool/fs@s', Errno.E2BIG]]), holds)).target).toBe(LONG_TAG);
            const invalid = Only(ClassifyHold(Errno.EINVAL, Items([['pool/fs@s', Errno.EINVAL]]), holds));
            expect(invalid).toBeInstanceOf(NameTooLong);
            expect(invalid.target).toBe(LONG_TAG);
        });

        it('scans every tag when no item is named', () => {
            const holds = { 'pool/a@s': 'short', 'pool/b@s': LONG_TAG };
            expect(Only(ClassifyHold(Errno.E2BIG, EMPTY, holds)).target).toBe(LONG_TAG);
        });

        it('reports the first malformed snapshot of a list-level failure', () => {
            const holds = { 'pool/a@s': 'tag', 'pool/b': 'tag' };
            const failure = Only(ClassifyHold(Errno.EINVAL, EMPTY, holds));
            expect(failure).toBeInstanceOf(NameInvalid);
            expect(failure.target).toBe('pool/b');
        });

        it('reports holds across pools', () => {
            const holds = { 'pool1/fs@s': 'tag', 'pool2/fs@s': 'tag' };
            expect(Only(ClassifyHold(Errno.EINVAL, Items([['pool1/fs@s', Errno.EINVAL]]), holds))).toBeInstanceOf(PoolsDiffer);
            expect(Only(ClassifyHold(Errno.EXDEV, EMPTY, holds))).toBeInstanceOf(PoolsDiffer);
        });
    });

    describe('release', () => {
        it('maps missing holds', () => {
            const failure = ClassifyRelease(Errno.ENOENT, Items([['pool/fs@s', Errno.ENOENT]]), { 'pool/fs@s': ['tag'] });
            expect(failure).toBeInstanceOf(HoldReleaseFailure);
            expect(Only(failure)).toBeInstanceOf(HoldNotFound);
        });

        it('reports the first overlong tag of the item', () => {
            const holds = { 'pool/fs@s': ['ok', LONG_TAG] };
            expect(Only(ClassifyRelease(Errno.E2BIG, Items([['pool/fs@s', Errno.E2BIG]]), holds)).target).toBe(LONG_TAG);
        });

        it('scans every tag when no item is named', () => {
            const holds = { 'pool/a@s': ['ok'], 'pool/b@s': [LONG_TAG] };
            expect(Only(ClassifyRelease(Errno.E2BIG, EMPTY, holds)).target).toBe(LONG_TAG);
        });

        it('reports an unsupported feature against the pool', () => {
            const failure = Only(ClassifyRelease(Errno.ENOTSUP, Items([['pool/fs@s', Errno.ENOTSUP]]), { 'pool/fs@s': ['tag'] }));
            expect(failure).toBeInstanceOf(FeatureNotSupported);
            expect(failure.target).toBe('pool');
        });

        it('wraps an invalid argument no check explains', () => {
            const holds = { 'pool/a@s': ['tag'], 'pool/b@s': ['tag'] };
            const failure = Only(ClassifyRelease(Errno.EINVAL, EMPTY, holds));
            expect(failure).toBeInstanceOf(GenericFailure);
            expect(failure.message).toBe('Failed to release snapshot hold (EINVAL)');
        });
    });

    describe('get holds', () => {
        it('maps the status table', () => {
            expect(ClassifyGetHolds(Errno.EINVAL, 'pool/fs')).toBeInstanceOf(NameInvalid);
            expect(ClassifyGetHolds(Errno.ENOENT, 'pool/fs@s')).toBeInstanceOf(SnapshotNotFound);
            expect(ClassifyGetHolds(Errno.ENOTSUP, 'pool/fs@s').target).toBe('pool');
        });
    });

    describe('send', () => {
        it('reports a cross-pool incremental source as pools differ', () => {
            const failure = ClassifySend(Errno.EXDEV, 'pool2/fs@s2', 'pool1/fs@s1');
            expect(failure).toBeInstanceOf(PoolsDiffer);
            expect(failure.target).toBe('pool2/fs@s2');
            expect(ClassifySendSpace(Errno.EXDEV, 'pool2/fs@s2', 'pool1/fs@s1')).toBeInstanceOf(PoolsDiffer);
        });

        it('reports a same-pool source that is not an ancestor as a mismatch', () => {
            expect(ClassifySend(Errno.EXDEV, 'pool/fs@s2', 'pool/fs@s1')).toBeInstanceOf(SnapshotMismatch);
        });

        it('accepts bookmarks as the source of a send but not of an estimate', () => {
            expect(ClassifySend(Errno.EINVAL, 'pool/fs@s', 'pool/fs').target).toBe('pool/fs');
            expect(ClassifySend(Errno.EINVAL, 'pool/fs@s', 'pool/fs#bm')).toBeInstanceOf(GenericFailure);
            expect(ClassifySendSpace(Errno.EINVAL, 'pool/fs@s', 'pool/fs#bm').target).toBe('pool/fs#bm');
        });

        it('maps missing and overlong names', () => {
            expect(ClassifySend(Errno.ENOENT, 'pool/fs@s', null)).toBeInstanceOf(SnapshotNotFound);
            expect(ClassifySend(Errno.ENOENT, 'pool/fs@s', 'bad')).toBeInstanceOf(NameInvalid);
            expect(ClassifySend(Errno.ENAMETOOLONG, 'pool/fs@s', null).target).toBe('pool/fs@s');
        });

        it('wraps a cross-device status without a source', () => {
            expect(ClassifySend(Errno.EXDEV, 'pool/fs@s', null).message).toBe('Failed to send snapshot (EXDEV): pool/fs@s');
        });
    });

    describe('receive', () => {
        it('maps space and pool states', () => {
            const noSpace = ClassifyReceive(Errno.ENOSPC, 'pool/fs@s', null);
            expect(noSpace).toBeInstanceOf(NoSpace);
            expect(noSpace.target).toBe('pool/fs');
            const readOnly = ClassifyReceive(Errno.EROFS, 'pool/fs@s', null);
            expect(readOnly).toBeInstanceOf(ReadOnlyPool);
            expect(readOnly.target).toBe('pool');
        });

        it('blames the stream once the names check out', () => {
            expect(ClassifyReceive(Errno.EINVAL, 'pool/fs@s', null)).toBeInstanceOf(BadStream);
            expect(ClassifyReceive(Errno.EINVAL, 'pool/fs@s', 'pool/origin').target).toBe('pool/origin');
            expect(ClassifyReceive(Errno.ENOTSUP, 'pool/fs@s', null)).toBeInstanceOf(StreamFeatureNotSupported);
        });
    });
});
