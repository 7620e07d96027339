/**
 * Per-operation classification of non-zero statuses.
 *
 * The same status means different things for different operations, and EINVAL alone covers several
 * causes. Invalid-argument rules therefore re-check the request the way the kernel does, in the same
 * order: name syntax, then name length, then cross-name consistency, and only then the settings.
 * Each function is pure and expects a non-zero status.
 */
import { Errno } from '../Domain/Errno.js';
import {
    FsName,
    IsTooLong,
    IsValidBookmarkName,
    IsValidFsName,
    IsValidSnapName,
    PoolName,
    SamePool,
} from '../Names/NameSyntax.js';
import { HandleErrorList, type ItemErrorMap } from './Batch.js';
import {
    BadHoldCleanupFD,
    BadStream,
    BookmarkDestructionFailure,
    BookmarkExists,
    BookmarkFailure,
    BookmarkMismatch,
    BookmarkNotSupported,
    DatasetBusy,
    DatasetExists,
    DatasetNotFound,
    DestinationModified,
    DuplicateSnapshots,
    FeatureNotSupported,
    FilesystemExists,
    FilesystemNotFound,
    GenericFailure,
    HoldExists,
    HoldFailure,
    HoldNotFound,
    HoldReleaseFailure,
    NameInvalid,
    NameTooLong,
    NoSpace,
    ParentNotFound,
    PoolNotFound,
    PoolsDiffer,
    PropertyInvalid,
    QuotaExceeded,
    ReadOnlyPool,
    SnapshotDestructionFailure,
    SnapshotExists,
    SnapshotFailure,
    SnapshotIsCloned,
    SnapshotIsHeld,
    SnapshotMismatch,
    SnapshotNotFound,
    StreamFeatureNotSupported,
    StreamMismatch,
    SuspendedPool,
    type MultipleFailure,
    type ZfsError,
} from './Failures.js';
import { Decide, On, OnIf, type Rule, type StatusContext } from './Rules.js';

interface NameContext extends StatusContext {
    name: string;
}

interface PairContext extends StatusContext {
    name: string;
    other: string;
}

interface OptionalSourceContext extends StatusContext {
    name: string;
    from: string | null;
}

interface ItemContext<R> extends StatusContext {
    name: string | null;
    request: R;
}

/** Snapshot name → hold tag. */
export type HoldRequest = Readonly<Record<string, string>>;
/** Snapshot name → tags to release. */
export type ReleaseRequest = Readonly<Record<string, readonly string[]>>;
/** Bookmark name → source snapshot. */
export type BookmarkRequest = Readonly<Record<string, string>>;

function Lookup<T>(record: Readonly<Record<string, T>>, key: string | null): T | undefined {
    return key !== null && Object.hasOwn(record, key) ? record[key] : undefined;
}

function FirstWhere(names: readonly string[], predicate: (name: string) => boolean): string | undefined {
    return names.find(predicate);
}

// create

const CREATE_RULES: readonly Rule<NameContext>[] = [
    OnIf(Errno.EINVAL, ctx => !IsValidFsName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    On(Errno.EINVAL, ctx => new PropertyInvalid(ctx.name)),
    On(Errno.EEXIST, ctx => new FilesystemExists(ctx.name)),
    On(Errno.ENOENT, ctx => new ParentNotFound(ctx.name)),
];

/**
 * @param status number - Non-zero status of the create call
 * @param name string - Filesystem or volume being created
 */
export function ClassifyCreate(status: number, name: string): ZfsError {
    return Decide(CREATE_RULES, { status, name }, ctx => new GenericFailure(ctx.status, ctx.name, `Failed to create filesystem`));
}

// clone

const CLONE_RULES: readonly Rule<PairContext>[] = [
    OnIf(Errno.EINVAL, ctx => !IsValidFsName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => !IsValidSnapName(ctx.other), ctx => new NameInvalid(ctx.other)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.other), ctx => new NameTooLong(ctx.other)),
    OnIf(Errno.EINVAL, ctx => PoolName(ctx.name) !== PoolName(ctx.other), ctx => new PoolsDiffer(ctx.name)),
    On(Errno.EINVAL, ctx => new PropertyInvalid(ctx.name)),
    On(Errno.EEXIST, ctx => new FilesystemExists(ctx.name)),
    On(Errno.ENOENT, ctx => new DatasetNotFound(ctx.name)),
];

/**
 * @param name string - Clone being created
 * @param origin string - Snapshot it is cloned from
 */
export function ClassifyClone(status: number, name: string, origin: string): ZfsError {
    return Decide(CLONE_RULES, { status, name, other: origin }, ctx => {
        return new GenericFailure(ctx.status, ctx.name, `Failed to create clone`);
    });
}

// rollback

const ROLLBACK_RULES: readonly Rule<NameContext>[] = [
    OnIf(Errno.EINVAL, ctx => !IsValidFsName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    On(Errno.EINVAL, ctx => new SnapshotNotFound(ctx.name)),
    OnIf(Errno.ENOENT, ctx => !IsValidFsName(ctx.name), ctx => new NameInvalid(ctx.name)),
    On(Errno.ENOENT, ctx => new FilesystemNotFound(ctx.name)),
];

/** @param name string - Filesystem rolled back to its latest snapshot */
export function ClassifyRollback(status: number, name: string): ZfsError {
    return Decide(ROLLBACK_RULES, { status, name }, ctx => new GenericFailure(ctx.status, ctx.name, `Failed to rollback`));
}

// snapshot

const SNAPSHOT_RULES: readonly Rule<ItemContext<readonly string[]>>[] = [
    OnIf(Errno.EXDEV, ctx => SamePool(ctx.request), ctx => new DuplicateSnapshots(ctx.name)),
    On(Errno.EXDEV, ctx => new PoolsDiffer(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.request.some(snap => !IsValidSnapName(snap)), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.request.some(IsTooLong), ctx => new NameTooLong(ctx.name)),
    On(Errno.EINVAL, ctx => new PropertyInvalid(ctx.name)),
    On(Errno.EEXIST, ctx => new SnapshotExists(ctx.name)),
    On(Errno.ENOENT, ctx => new FilesystemNotFound(ctx.name)),
];

/**
 * @param status number - Aggregate status of the snapshot call
 * @param items ItemErrorMap - Per-snapshot statuses
 * @param snaps readonly string[] - Requested snapshot names
 */
export function ClassifySnapshot(status: number, items: ItemErrorMap, snaps: readonly string[]): MultipleFailure {
    return HandleErrorList(status, items, snaps, SnapshotFailure, (itemStatus, name) => {
        return Decide(SNAPSHOT_RULES, { status: itemStatus, name, request: snaps }, ctx => {
            return new GenericFailure(ctx.status, ctx.name, `Failed to create snapshot`);
        });
    });
}

// destroy snapshots

const DESTROY_SNAPS_RULES: readonly Rule<ItemContext<readonly string[]>>[] = [
    On(Errno.EEXIST, ctx => new SnapshotIsCloned(ctx.name)),
    On(Errno.ENOENT, ctx => new PoolNotFound(ctx.name)),
    On(Errno.EBUSY, ctx => new SnapshotIsHeld(ctx.name)),
];

export function ClassifyDestroySnaps(status: number, items: ItemErrorMap, snaps: readonly string[]): MultipleFailure {
    return HandleErrorList(status, items, snaps, SnapshotDestructionFailure, (itemStatus, name) => {
        return Decide(DESTROY_SNAPS_RULES, { status: itemStatus, name, request: snaps }, ctx => {
            return new GenericFailure(ctx.status, ctx.name, `Failed to destroy snapshot`);
        });
    });
}

// bookmark

function BookmarkSource(ctx: ItemContext<BookmarkRequest>): string | undefined {
    return Lookup(ctx.request, ctx.name);
}

const BOOKMARK_RULES: readonly Rule<ItemContext<BookmarkRequest>>[] = [
    // an item name is present: find which property of that item is wrong
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name !== null && !IsValidBookmarkName(ctx.name),
        ctx => new NameInvalid(ctx.name),
    ),
    OnIf(
        Errno.EINVAL,
        ctx => {
            const source = BookmarkSource(ctx);
            return source !== undefined && !IsValidSnapName(source);
        },
        ctx => new NameInvalid(BookmarkSource(ctx) ?? ctx.name),
    ),
    OnIf(Errno.EINVAL, ctx => ctx.name !== null && IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(
        Errno.EINVAL,
        ctx => {
            const source = BookmarkSource(ctx);
            return ctx.name !== null && source !== undefined && FsName(ctx.name) !== FsName(source);
        },
        ctx => new BookmarkMismatch(ctx.name),
    ),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name !== null && !SamePool([ctx.name, ...Object.keys(ctx.request)]),
        ctx => new PoolsDiffer(ctx.name),
    ),
    // list-level failure: report the first malformed bookmark
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name === null && FirstWhere(Object.keys(ctx.request), name => !IsValidBookmarkName(name)) !== undefined,
        ctx => new NameInvalid(FirstWhere(Object.keys(ctx.request), name => !IsValidBookmarkName(name)) ?? null),
    ),
    On(Errno.EEXIST, ctx => new BookmarkExists(ctx.name)),
    On(Errno.ENOENT, ctx => new SnapshotNotFound(ctx.name)),
    On(Errno.ENOTSUP, ctx => new BookmarkNotSupported(ctx.name)),
];

/**
 * @param items ItemErrorMap - Per-bookmark statuses
 * @param bookmarks BookmarkRequest - Bookmark name → source snapshot
 */
export function ClassifyBookmark(status: number, items: ItemErrorMap, bookmarks: BookmarkRequest): MultipleFailure {
    return HandleErrorList(status, items, Object.keys(bookmarks), BookmarkFailure, (itemStatus, name) => {
        return Decide(BOOKMARK_RULES, { status: itemStatus, name, request: bookmarks }, ctx => {
            return new GenericFailure(ctx.status, ctx.name, `Failed to create bookmark`);
        });
    });
}

const GET_BOOKMARKS_RULES: readonly Rule<NameContext>[] = [On(Errno.ENOENT, ctx => new FilesystemNotFound(ctx.name))];

/** @param fsname string - Filesystem whose bookmarks were listed */
export function ClassifyGetBookmarks(status: number, fsname: string): ZfsError {
    return Decide(GET_BOOKMARKS_RULES, { status, name: fsname }, ctx => {
        return new GenericFailure(ctx.status, ctx.name, `Failed to list bookmarks`);
    });
}

const DESTROY_BOOKMARKS_RULES: readonly Rule<ItemContext<readonly string[]>>[] = [
    On(Errno.EINVAL, ctx => new NameInvalid(ctx.name)),
];

export function ClassifyDestroyBookmarks(status: number, items: ItemErrorMap, bookmarks: readonly string[]): MultipleFailure {
    return HandleErrorList(status, items, bookmarks, BookmarkDestructionFailure, (itemStatus, name) => {
        return Decide(DESTROY_BOOKMARKS_RULES, { status: itemStatus, name, request: bookmarks }, ctx => {
            return new GenericFailure(ctx.status, ctx.name, `Failed to destroy bookmark`);
        });
    });
}

// space used by a snapshot range

const SNAPRANGE_RULES: readonly Rule<PairContext>[] = [
    OnIf(Errno.EINVAL, ctx => !IsValidSnapName(ctx.other), ctx => new NameInvalid(ctx.other)),
    OnIf(Errno.EINVAL, ctx => !IsValidSnapName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.other), ctx => new NameTooLong(ctx.other)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(Errno.EINVAL, ctx => PoolName(ctx.other) !== PoolName(ctx.name), ctx => new PoolsDiffer(ctx.name)),
    On(Errno.EINVAL, ctx => new SnapshotMismatch(ctx.name)),
    On(Errno.ENOENT, ctx => new SnapshotNotFound(ctx.name)),
];

/**
 * @param firstsnap string - Oldest snapshot of the range
 * @param lastsnap string - Newest snapshot of the range; failures are reported against it
 */
export function ClassifySnaprangeSpace(status: number, firstsnap: string, lastsnap: string): ZfsError {
    return Decide(SNAPRANGE_RULES, { status, name: lastsnap, other: firstsnap }, ctx => {
        return new GenericFailure(ctx.status, ctx.name, `Failed to calculate space used by range of snapshots`);
    });
}

// holds

function FirstInvalidSnap(names: readonly string[]): string | undefined {
    return FirstWhere(names, name => !IsValidSnapName(name));
}

function FirstLongHoldTag(holds: HoldRequest): string | undefined {
    return FirstWhere(Object.values(holds), IsTooLong);
}

const HOLD_RULES: readonly Rule<ItemContext<HoldRequest>>[] = [
    On(Errno.EXDEV, ctx => new PoolsDiffer(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.name !== null && !IsValidSnapName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.name !== null && IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(
        Errno.EINVAL,
        ctx => {
            const tag = Lookup(ctx.request, ctx.name);
            return tag !== undefined && IsTooLong(tag);
        },
        ctx => new NameTooLong(Lookup(ctx.request, ctx.name) ?? ctx.name),
    ),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name !== null && !SamePool([ctx.name, ...Object.keys(ctx.request)]),
        ctx => new PoolsDiffer(ctx.name),
    ),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name === null && FirstInvalidSnap(Object.keys(ctx.request)) !== undefined,
        ctx => new NameInvalid(FirstInvalidSnap(Object.keys(ctx.request)) ?? null),
    ),
    On(Errno.ENOENT, ctx => new FilesystemNotFound(ctx.name === null ? null : FsName(ctx.name))),
    On(Errno.EEXIST, ctx => new HoldExists(ctx.name)),
    On(Errno.E2BIG, ctx => new NameTooLong(Lookup(ctx.request, ctx.name) ?? FirstLongHoldTag(ctx.request) ?? null)),
    On(Errno.ENOTSUP, ctx => new FeatureNotSupported(ctx.name === null ? null : PoolName(ctx.name))),
];

/**
 * @param status number - Aggregate status of the hold call
 * @param items ItemErrorMap - Per-snapshot statuses
 * @param holds HoldRequest - Snapshot → tag
 * @returns ZfsError - BadHoldCleanupFD for a bad cleanup descriptor, a HoldFailure otherwise
 */
export function ClassifyHold(status: number, items: ItemErrorMap, holds: HoldRequest): ZfsError {
    if (status === Errno.EBADF) {
        return new BadHoldCleanupFD();
    }
    return HandleErrorList(status, items, Object.keys(holds), HoldFailure, (itemStatus, name) => {
        return Decide(HOLD_RULES, { status: itemStatus, name, request: holds }, ctx => {
            return new GenericFailure(ctx.status, ctx.name, `Failed to hold snapshot`);
        });
    });
}

function FirstLongReleaseTag(ctx: ItemContext<ReleaseRequest>): string | undefined {
    const own = Lookup(ctx.request, ctx.name);
    const tags = own ?? Object.values(ctx.request).flat();
    return FirstWhere(tags, IsTooLong);
}

const RELEASE_RULES: readonly Rule<ItemContext<ReleaseRequest>>[] = [
    On(Errno.EXDEV, ctx => new PoolsDiffer(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.name !== null && !IsValidSnapName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.name !== null && IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name !== null && FirstLongReleaseTag(ctx) !== undefined,
        ctx => new NameTooLong(FirstLongReleaseTag(ctx) ?? ctx.name),
    ),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name !== null && !SamePool([ctx.name, ...Object.keys(ctx.request)]),
        ctx => new PoolsDiffer(ctx.name),
    ),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.name === null && FirstInvalidSnap(Object.keys(ctx.request)) !== undefined,
        ctx => new NameInvalid(FirstInvalidSnap(Object.keys(ctx.request)) ?? null),
    ),
    On(Errno.ENOENT, ctx => new HoldNotFound(ctx.name)),
    On(Errno.E2BIG, ctx => new NameTooLong(FirstLongReleaseTag(ctx) ?? ctx.name)),
    On(Errno.ENOTSUP, ctx => new FeatureNotSupported(ctx.name === null ? null : PoolName(ctx.name))),
];

/**
 * @param items ItemErrorMap - Per-snapshot statuses
 * @param holds ReleaseRequest - Snapshot → tags being released
 */
export function ClassifyRelease(status: number, items: ItemErrorMap, holds: ReleaseRequest): MultipleFailure {
    return HandleErrorList(status, items, Object.keys(holds), HoldReleaseFailure, (itemStatus, name) => {
        return Decide(RELEASE_RULES, { status: itemStatus, name, request: holds }, ctx => {
            return new GenericFailure(ctx.status, ctx.name, `Failed to release snapshot hold`);
        });
    });
}

const GET_HOLDS_RULES: readonly Rule<NameContext>[] = [
    OnIf(Errno.EINVAL, ctx => !IsValidSnapName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    On(Errno.ENOENT, ctx => new SnapshotNotFound(ctx.name)),
    On(Errno.ENOTSUP, ctx => new FeatureNotSupported(PoolName(ctx.name))),
];

/** @param snapname string - Snapshot whose holds were listed */
export function ClassifyGetHolds(status: number, snapname: string): ZfsError {
    return Decide(GET_HOLDS_RULES, { status, name: snapname }, ctx => {
        return new GenericFailure(ctx.status, ctx.name, `Failed to get holds on snapshot`);
    });
}

// send / receive

function IsBadSource(from: string | null): from is string {
    return from !== null && !IsValidSnapName(from) && !IsValidBookmarkName(from);
}

/** Cross-device with an incremental source: different pools, or a source that is not an ancestor. */
const INCREMENTAL_SOURCE_RULES: readonly Rule<OptionalSourceContext>[] = [
    OnIf(
        Errno.EXDEV,
        ctx => ctx.from !== null && PoolName(ctx.from) !== PoolName(ctx.name),
        ctx => new PoolsDiffer(ctx.name),
    ),
    OnIf(Errno.EXDEV, ctx => ctx.from !== null, ctx => new SnapshotMismatch(ctx.name)),
];

const SEND_RULES: readonly Rule<OptionalSourceContext>[] = [
    ...INCREMENTAL_SOURCE_RULES,
    OnIf(Errno.EINVAL, ctx => IsBadSource(ctx.from), ctx => new NameInvalid(ctx.from)),
    OnIf(
        Errno.EINVAL,
        ctx => !IsValidSnapName(ctx.name) && !IsValidFsName(ctx.name),
        ctx => new NameInvalid(ctx.name),
    ),
    OnIf(Errno.EINVAL, ctx => ctx.from !== null && IsTooLong(ctx.from), ctx => new NameTooLong(ctx.from)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.from !== null && PoolName(ctx.from) !== PoolName(ctx.name),
        ctx => new PoolsDiffer(ctx.name),
    ),
    OnIf(Errno.ENOENT, ctx => IsBadSource(ctx.from), ctx => new NameInvalid(ctx.from)),
    On(Errno.ENOENT, ctx => new SnapshotNotFound(ctx.name)),
    OnIf(Errno.ENAMETOOLONG, ctx => ctx.from !== null && IsTooLong(ctx.from), ctx => new NameTooLong(ctx.from)),
    On(Errno.ENAMETOOLONG, ctx => new NameTooLong(ctx.name)),
];

/**
 * @param snapname string - Snapshot (or filesystem) being sent
 * @param fromsnap string|null - Incremental source snapshot or bookmark
 */
export function ClassifySend(status: number, snapname: string, fromsnap: string | null): ZfsError {
    return Decide(SEND_RULES, { status, name: snapname, from: fromsnap }, ctx => {
        return new GenericFailure(ctx.status, ctx.name, `Failed to send snapshot`);
    });
}

const SEND_SPACE_RULES: readonly Rule<OptionalSourceContext>[] = [
    ...INCREMENTAL_SOURCE_RULES,
    OnIf(Errno.EINVAL, ctx => ctx.from !== null && !IsValidSnapName(ctx.from), ctx => new NameInvalid(ctx.from)),
    OnIf(Errno.EINVAL, ctx => !IsValidSnapName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.from !== null && IsTooLong(ctx.from), ctx => new NameTooLong(ctx.from)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(
        Errno.EINVAL,
        ctx => ctx.from !== null && PoolName(ctx.from) !== PoolName(ctx.name),
        ctx => new PoolsDiffer(ctx.name),
    ),
    OnIf(Errno.ENOENT, ctx => ctx.from !== null && !IsValidSnapName(ctx.from), ctx => new NameInvalid(ctx.from)),
    On(Errno.ENOENT, ctx => new SnapshotNotFound(ctx.name)),
];

export function ClassifySendSpace(status: number, snapname: string, fromsnap: string | null): ZfsError {
    return Decide(SEND_SPACE_RULES, { status, name: snapname, from: fromsnap }, ctx => {
        return new GenericFailure(ctx.status, ctx.name, `Failed to estimate backup stream size`);
    });
}

const RECEIVE_RULES: readonly Rule<OptionalSourceContext>[] = [
    OnIf(Errno.EINVAL, ctx => !IsValidSnapName(ctx.name), ctx => new NameInvalid(ctx.name)),
    OnIf(Errno.EINVAL, ctx => IsTooLong(ctx.name), ctx => new NameTooLong(ctx.name)),
    OnIf(Errno.EINVAL, ctx => ctx.from !== null && !IsValidSnapName(ctx.from), ctx => new NameInvalid(ctx.from)),
    On(Errno.EINVAL, () => new BadStream()),
    OnIf(Errno.ENOENT, ctx => !IsValidSnapName(ctx.name), ctx => new NameInvalid(ctx.name)),
    On(Errno.ENOENT, ctx => new DatasetNotFound(ctx.name)),
    On(Errno.EEXIST, ctx => new DatasetExists(ctx.name)),
    On(Errno.ENOTSUP, () => new StreamFeatureNotSupported()),
    On(Errno.ENODEV, ctx => new StreamMismatch(FsName(ctx.name))),
    On(Errno.ETXTBSY, ctx => new DestinationModified(FsName(ctx.name))),
    On(Errno.EBUSY, ctx => new DatasetBusy(FsName(ctx.name))),
    On(Errno.ENOSPC, ctx => new NoSpace(FsName(ctx.name))),
    On(Errno.EDQUOT, ctx => new QuotaExceeded(FsName(ctx.name))),
    On(Errno.ENAMETOOLONG, ctx => new NameTooLong(ctx.name)),
    On(Errno.EROFS, ctx => new ReadOnlyPool(PoolName(ctx.name))),
    On(Errno.EAGAIN, ctx => new SuspendedPool(PoolName(ctx.name))),
];

/**
 * @param snapname string - Snapshot the stream is received into
 * @param origin string|null - Clone origin for a clone stream
 */
export function ClassifyReceive(status: number, snapname: string, origin: string | null): ZfsError {
    return Decide(RECEIVE_RULES, { status, name: snapname, from: origin }, ctx => {
        return new GenericFailure(ctx.status, ctx.name, `Failed to receive stream`);
    });
}
