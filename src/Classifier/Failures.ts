/**
 * Failures raised by management operations.
 *
 * Each kind is its own class with a unique `code`; `errno` is the status the kind usually stems from
 * and `target` the name the failure is about (null when no single name applies).
 * Batch operations raise a MultipleFailure subclass wrapping the per-item failures.
 */
import { AppError, ERROR_CODES, type ErrorCode } from '../Common/Errors.js';
import { Errno, StatusName } from '../Domain/Errno.js';

export abstract class ZfsError extends AppError {
    /**
     * @param code ErrorCode - Kind of failure
     * @param errno number - Status code behind it
     * @param target string|null - Offending name
     * @param message string - Summary; the target is appended when present
     */
    constructor(
        code: ErrorCode,
        public readonly errno: number,
        public readonly target: string | null,
        message: string,
    ) {
        super(code, target === null ? message : `${message}: ${target}`, { errno, target });
    }
}

export class NameInvalid extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.NAME_INVALID, Errno.EINVAL, target, `Invalid name`);
    }
}

export class NameTooLong extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.NAME_TOO_LONG, Errno.ENAMETOOLONG, target, `Name too long`);
    }
}

export class PropertyInvalid extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.PROPERTY_INVALID, Errno.EINVAL, target, `Invalid property or property value`);
    }
}

export class PoolsDiffer extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.POOLS_DIFFER, Errno.EXDEV, target, `Source and target belong to different pools`);
    }
}

export class FilesystemExists extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.FILESYSTEM_EXISTS, Errno.EEXIST, target, `Filesystem already exists`);
    }
}

export class DatasetExists extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.DATASET_EXISTS, Errno.EEXIST, target, `Dataset already exists`);
    }
}

export class SnapshotExists extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.SNAPSHOT_EXISTS, Errno.EEXIST, target, `Snapshot already exists`);
    }
}

export class HoldExists extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.HOLD_EXISTS, Errno.EEXIST, target, `Hold with a given tag already exists on snapshot`);
    }
}

export class BookmarkExists extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.BOOKMARK_EXISTS, Errno.EEXIST, target, `Bookmark already exists`);
    }
}

export class FilesystemNotFound extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.FILESYSTEM_NOT_FOUND, Errno.ENOENT, target, `Filesystem not found`);
    }
}

export class DatasetNotFound extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.DATASET_NOT_FOUND, Errno.ENOENT, target, `Dataset not found`);
    }
}

export class SnapshotNotFound extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.SNAPSHOT_NOT_FOUND, Errno.ENOENT, target, `Snapshot not found`);
    }
}

export class PoolNotFound extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.POOL_NOT_FOUND, Errno.EXDEV, target, `No such pool`);
    }
}

export class ParentNotFound extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.PARENT_NOT_FOUND, Errno.ENOENT, target, `Parent not found`);
    }
}

export class HoldNotFound extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.HOLD_NOT_FOUND, Errno.ENOENT, target, `Hold with a given tag does not exist on snapshot`);
    }
}

export class DatasetBusy extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.DATASET_BUSY, Errno.EBUSY, target, `Dataset is busy`);
    }
}

export class SnapshotIsHeld extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.SNAPSHOT_IS_HELD, Errno.EBUSY, target, `Snapshot has holds`);
    }
}

export class SnapshotIsCloned extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.SNAPSHOT_IS_CLONED, Errno.EEXIST, target, `Snapshot is cloned`);
    }
}

export class DuplicateSnapshots extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.DUPLICATE_SNAPSHOTS, Errno.EXDEV, target, `Requested multiple snapshots of the same filesystem`);
    }
}

export class SnapshotMismatch extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.SNAPSHOT_MISMATCH, Errno.ENODEV, target, `Snapshot is not descendant of source snapshot`);
    }
}

export class BookmarkMismatch extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.BOOKMARK_MISMATCH, Errno.EINVAL, target, `Bookmark is not in snapshot's filesystem`);
    }
}

export class BookmarkNotSupported extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.BOOKMARK_NOT_SUPPORTED, Errno.ENOTSUP, target, `Bookmark feature is not supported`);
    }
}

export class FeatureNotSupported extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.FEATURE_NOT_SUPPORTED, Errno.ENOTSUP, target, `Feature is not supported in this version`);
    }
}

export class BadHoldCleanupFD extends ZfsError {
    constructor() {
        super(ERROR_CODES.BAD_HOLD_CLEANUP_FD, Errno.EBADF, null, `Bad file descriptor as cleanup file descriptor`);
    }
}

export class QuotaExceeded extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.QUOTA_EXCEEDED, Errno.EDQUOT, target, `Quota exceeded`);
    }
}

export class NoSpace extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.NO_SPACE, Errno.ENOSPC, target, `No space left`);
    }
}

export class ReadOnlyPool extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.READ_ONLY_POOL, Errno.EROFS, target, `Pool is read-only`);
    }
}

export class SuspendedPool extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.SUSPENDED_POOL, Errno.EAGAIN, target, `Pool is suspended`);
    }
}

export class StreamMismatch extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.STREAM_MISMATCH, Errno.ENODEV, target, `Stream is not applicable to destination dataset`);
    }
}

export class StreamFeatureNotSupported extends ZfsError {
    constructor() {
        super(ERROR_CODES.STREAM_FEATURE_NOT_SUPPORTED, Errno.ENOTSUP, null, `Stream contains unsupported feature`);
    }
}

export class BadStream extends ZfsError {
    constructor() {
        super(ERROR_CODES.BAD_STREAM, Errno.EINVAL, null, `Bad backup stream`);
    }
}

export class DestinationModified extends ZfsError {
    constructor(target: string | null) {
        super(ERROR_CODES.DESTINATION_MODIFIED, Errno.ETXTBSY, target, `Destination dataset has modifications that can not be undone`);
    }
}

/** Escape hatch: a status no table row covers, kept with the operation it came from. */
export class GenericFailure extends ZfsError {
    constructor(errno: number, target: string | null, description: string) {
        super(ERROR_CODES.GENERIC_FAILURE, errno, target, `${description} (${StatusName(errno)})`);
    }
}

/**
 * Failure of a batch operation: the per-item failures in report order plus the number of
 * further failures the library did not enumerate.
 */
export abstract class MultipleFailure extends ZfsError {
    constructor(
        code: ErrorCode,
        message: string,
        public readonly errors: readonly ZfsError[],
        public readonly suppressedCount: number,
    ) {
        super(code, errors.length > 0 ? errors[0].errno : 0, null, message);
    }
}

/** Constructor shape shared by the batch failures. */
export type MultipleFailureClass = new (errors: readonly ZfsError[], suppressedCount: number) => MultipleFailure;

export class SnapshotFailure extends MultipleFailure {
    constructor(errors: readonly ZfsError[], suppressedCount: number) {
        super(ERROR_CODES.SNAPSHOT_FAILURE, `Creation of snapshot(s) failed for one or more reasons`, errors, suppressedCount);
    }
}

export class SnapshotDestructionFailure extends MultipleFailure {
    constructor(errors: readonly ZfsError[], suppressedCount: number) {
        super(
            ERROR_CODES.SNAPSHOT_DESTRUCTION_FAILURE,
            `Destruction of snapshot(s) failed for one or more reasons`,
            errors,
            suppressedCount,
        );
    }
}

export class HoldFailure extends MultipleFailure {
    constructor(errors: readonly ZfsError[], suppressedCount: number) {
        super(ERROR_CODES.HOLD_FAILURE, `Placement of hold(s) failed for one or more reasons`, errors, suppressedCount);
    }
}

export class HoldReleaseFailure extends MultipleFailure {
    constructor(errors: readonly ZfsError[], suppressedCount: number) {
        super(ERROR_CODES.HOLD_RELEASE_FAILURE, `Release of hold(s) failed for one or more reasons`, errors, suppressedCount);
    }
}

export class BookmarkFailure extends MultipleFailure {
    constructor(errors: readonly ZfsError[], suppressedCount: number) {
        super(ERROR_CODES.BOOKMARK_FAILURE, `Creation of bookmark(s) failed for one or more reasons`, errors, suppressedCount);
    }
}

export class BookmarkDestructionFailure extends MultipleFailure {
    constructor(errors: readonly ZfsError[], suppressedCount: number) {
        super(
            ERROR_CODES.BOOKMARK_DESTRUCTION_FAILURE,
            `Destruction of bookmark(s) failed for one or more reasons`,
            errors,
            suppressedCount,
        );
    }
}
