/**
 * Operation facade over the external management library.
 *
 * Each method builds its request maps, encodes them for the duration of the call, decodes the
 * outputs, and turns a non-zero status into the matching classified failure. Containers are
 * released before a failure is thrown.
 */
import { AppError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { ParseItemErrors } from '../Classifier/Batch.js';
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
    type BookmarkRequest,
    type HoldRequest,
    type ReleaseRequest,
} from '../Classifier/Operations.js';
import { ObjsetType, SEND_FLAGS, type LzcLibrary, type SendFlag } from '../Domain/Lzc.js';
import type { PropertyInput, PropertyMap } from '../Domain/Property.js';
import { EVENT_NAMES, type OperationEvent } from '../Domain/Utility.js';
import type { IntegerKind, NvpairLibrary } from '../Domain/Wire.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { NvlistCodec } from '../Nvlist/Codec.js';
import { ToHostInteger } from '../Nvlist/TypeRegistry.js';
import type { ValidatedConfig } from '../Types/Config.js';
import { metricsService, type MetricsService } from './MetricsService.js';

const FROM = log.Helper_LocationBuilder(`Services`, `LzcService`);

export interface LzcServiceOptions {
    integerKeyTypes?: Readonly<Record<string, IntegerKind>>;
    /** Publish `operation.succeeded` / `operation.failed`; default true. */
    emitEvents?: boolean;
    eventBus?: MainEventBus;
    metrics?: MetricsService;
}

/** Map with a presence-only entry per name. */
function PresenceMap(names: Iterable<string>): PropertyMap {
    const map: PropertyMap = new Map();
    for (const name of names) {
        map.set(name, null);
    }
    return map;
}

function StringMap(record: Readonly<Record<string, string>>): PropertyMap {
    const map: PropertyMap = new Map();
    for (const [key, value] of Object.entries(record)) {
        map.set(key, value);
    }
    return map;
}

/**
 * LzcService wraps the management calls with encoding, decoding and failure classification.
 * @example
 * const service = new LzcService(lib, nvpair);
 * service.Snapshot(['tank/fs@daily']);
 */
export class LzcService {
    private _codec: NvlistCodec;
    private _emitEvents: boolean;
    private _eventBus: MainEventBus;
    private _metrics: MetricsService;

    /**
     * @param lib LzcLibrary - Management call boundary
     * @param nvpair NvpairLibrary - Container library shared with `lib`
     * @param options LzcServiceOptions - Fixed-width keys, event and metrics sinks
     */
    constructor(
        private readonly lib: LzcLibrary,
        nvpair: NvpairLibrary,
        options: LzcServiceOptions = {},
    ) {
        this._metrics = options.metrics ?? metricsService;
        this._codec = new NvlistCodec(nvpair, { integerKeyTypes: options.integerKeyTypes, metrics: this._metrics });
        this._emitEvents = options.emitEvents ?? true;
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
    }

    /** Builds a service from validated configuration. */
    public static FromConfig(lib: LzcLibrary, nvpair: NvpairLibrary, config: ValidatedConfig): LzcService {
        return new LzcService(lib, nvpair, { integerKeyTypes: config.integerKeyTypes, emitEvents: config.emitEvents });
    }

    /**
     * Creates a filesystem or, with `isZvol`, a volume.
     * @throws FilesystemExists | ParentNotFound | NameInvalid | NameTooLong | PropertyInvalid | GenericFailure
     */
    public Create(name: string, isZvol: boolean = false, props: PropertyInput = {}): void {
        this._run(`create`, [name], () => {
            const type = isZvol ? ObjsetType.ZVOL : ObjsetType.ZFS;
            const status = this._codec.In(props, nvl => {
                return this.lib.Create(name, type, nvl);
            });
            if (status !== 0) {
                throw ClassifyCreate(status, name);
            }
        });
    }

    /** Creates `name` as a clone of the snapshot `origin`. */
    public Clone(name: string, origin: string, props: PropertyInput = {}): void {
        this._run(`clone`, [name, origin], () => {
            const status = this._codec.In(props, nvl => {
                return this.lib.Clone(name, origin, nvl);
            });
            if (status !== 0) {
                throw ClassifyClone(status, name, origin);
            }
        });
    }

    /**
     * Rolls a filesystem back to its latest snapshot.
     * @returns string - Name of the snapshot rolled back to
     */
    public Rollback(name: string): string {
        return this._run(`rollback`, [name], () => {
            const { status, value } = this.lib.Rollback(name);
            if (status !== 0) {
                throw ClassifyRollback(status, name);
            }
            return value;
        });
    }

    /**
     * Atomically creates snapshots, all in one pool.
     * @throws SnapshotFailure wrapping the per-snapshot failures
     */
    public Snapshot(snaps: readonly string[], props: PropertyInput = {}): void {
        this._run(`snapshot`, snaps, () => {
            const errlist: PropertyMap = new Map();
            const status = this._codec.In(PresenceMap(snaps), snapsNvl => {
                return this._codec.In(props, propsNvl => {
                    return this._codec.Out(errlist, slot => {
                        return this.lib.Snapshot(snapsNvl, propsNvl, slot);
                    });
                });
            });
            if (status !== 0) {
                throw ClassifySnapshot(status, ParseItemErrors(errlist), snaps);
            }
        });
    }

    /**
     * Destroys snapshots; with `defer` held or cloned ones are marked for deferred destruction.
     * @throws SnapshotDestructionFailure
     */
    public DestroySnaps(snaps: readonly string[], defer: boolean = false): void {
        this._run(`destroy_snaps`, snaps, () => {
            const errlist: PropertyMap = new Map();
            const status = this._codec.In(PresenceMap(snaps), snapsNvl => {
                return this._codec.Out(errlist, slot => {
                    return this.lib.DestroySnaps(snapsNvl, defer, slot);
                });
            });
            if (status !== 0) {
                throw ClassifyDestroySnaps(status, ParseItemErrors(errlist), snaps);
            }
        });
    }

    /**
     * @param bookmarks BookmarkRequest - Bookmark name → source snapshot
     * @throws BookmarkFailure
     */
    public Bookmark(bookmarks: BookmarkRequest): void {
        this._run(`bookmark`, Object.keys(bookmarks), () => {
            const errlist: PropertyMap = new Map();
            const status = this._codec.In(StringMap(bookmarks), nvl => {
                return this._codec.Out(errlist, slot => {
                    return this.lib.Bookmark(nvl, slot);
                });
            });
            if (status !== 0) {
                throw ClassifyBookmark(status, ParseItemErrors(errlist), bookmarks);
            }
        });
    }

    /**
     * Lists the bookmarks of a filesystem.
     * @param props readonly string[] - Bookmark properties to retrieve
     * @returns PropertyMap - Bookmark short name → property map
     */
    public GetBookmarks(fsname: string, props: readonly string[] = []): PropertyMap {
        return this._run(`get_bookmarks`, [fsname], () => {
            const bookmarks: PropertyMap = new Map();
            const status = this._codec.In(PresenceMap(props), propsNvl => {
                return this._codec.Out(bookmarks, slot => {
                    return this.lib.GetBookmarks(fsname, propsNvl, slot);
                });
            });
            if (status !== 0) {
                throw ClassifyGetBookmarks(status, fsname);
            }
            return bookmarks;
        });
    }

    /** @throws BookmarkDestructionFailure */
    public DestroyBookmarks(bookmarks: readonly string[]): void {
        this._run(`destroy_bookmarks`, bookmarks, () => {
            const errlist: PropertyMap = new Map();
            const status = this._codec.In(PresenceMap(bookmarks), nvl => {
                return this._codec.Out(errlist, slot => {
                    return this.lib.DestroyBookmarks(nvl, slot);
                });
            });
            if (status !== 0) {
                throw ClassifyDestroyBookmarks(status, ParseItemErrors(errlist), bookmarks);
            }
        });
    }

    /**
     * Space that destroying the snapshots from `firstsnap` through `lastsnap` would free.
     * @returns number | bigint - Bytes; bigint when beyond the safe integer range
     */
    public SnaprangeSpace(firstsnap: string, lastsnap: string): number | bigint {
        return this._run(`snaprange_space`, [firstsnap, lastsnap], () => {
            const { status, value } = this.lib.SnaprangeSpace(firstsnap, lastsnap);
            if (status !== 0) {
                throw ClassifySnaprangeSpace(status, firstsnap, lastsnap);
            }
            return ToHostInteger(value);
        });
    }

    /**
     * Places user holds on snapshots.
     * @param holds HoldRequest - Snapshot → hold tag
     * @param cleanupFd number - Descriptor whose closing releases the holds; -1 for none
     * @returns string[] - Requested snapshots that do not exist
     * @throws HoldFailure | BadHoldCleanupFD
     */
    public Hold(holds: HoldRequest, cleanupFd: number = -1): string[] {
        return this._run(`hold`, Object.keys(holds), () => {
            const errlist: PropertyMap = new Map();
            const status = this._codec.In(StringMap(holds), nvl => {
                return this._codec.Out(errlist, slot => {
                    return this.lib.Hold(nvl, cleanupFd, slot);
                });
            });
            const items = ParseItemErrors(errlist);
            if (status !== 0) {
                throw ClassifyHold(status, items, holds);
            }
            // on success the list only names snapshots that were missing
            return [...items.errors.keys()];
        });
    }

    /**
     * Releases user holds.
     * @param holds ReleaseRequest - Snapshot → tags to release
     * @returns string[] - Requested snapshots that do not exist
     * @throws HoldReleaseFailure
     */
    public Release(holds: ReleaseRequest): string[] {
        return this._run(`release`, Object.keys(holds), () => {
            const request: PropertyMap = new Map();
            for (const [snap, tags] of Object.entries(holds)) {
                request.set(snap, PresenceMap(tags));
            }
            const errlist: PropertyMap = new Map();
            const status = this._codec.In(request, nvl => {
                return this._codec.Out(errlist, slot => {
                    return this.lib.Release(nvl, slot);
                });
            });
            const items = ParseItemErrors(errlist);
            if (status !== 0) {
                throw ClassifyRelease(status, items, holds);
            }
            return [...items.errors.keys()];
        });
    }

    /**
     * @returns PropertyMap - Hold tag → creation time
     */
    public GetHolds(snapname: string): PropertyMap {
        return this._run(`get_holds`, [snapname], () => {
            const holds: PropertyMap = new Map();
            const status = this._codec.Out(holds, slot => {
                return this.lib.GetHolds(snapname, slot);
            });
            if (status !== 0) {
                throw ClassifyGetHolds(status, snapname);
            }
            return holds;
        });
    }

    /**
     * Writes a send stream for `snapname` to `fd`, incremental from `fromsnap` when given.
     */
    public Send(snapname: string, fromsnap: string | null, fd: number, flags: readonly SendFlag[] = []): void {
        this._run(`send`, fromsnap === null ? [snapname] : [snapname, fromsnap], () => {
            const mask = flags.reduce((acc, flag) => {
                return acc | SEND_FLAGS[flag];
            }, 0);
            const status = this.lib.Send(snapname, fromsnap, fd, mask);
            if (status !== 0) {
                throw ClassifySend(status, snapname, fromsnap);
            }
        });
    }

    /**
     * Estimated size of the stream Send would write.
     * @returns number | bigint - Bytes
     */
    public SendSpace(snapname: string, fromsnap: string | null = null): number | bigint {
        return this._run(`send_space`, fromsnap === null ? [snapname] : [snapname, fromsnap], () => {
            const { status, value } = this.lib.SendSpace(snapname, fromsnap);
            if (status !== 0) {
                throw ClassifySendSpace(status, snapname, fromsnap);
            }
            return ToHostInteger(value);
        });
    }

    /**
     * Receives a stream from `fd` into `snapname`.
     * @param origin string|null - Clone origin for a clone stream
     */
    public Receive(
        snapname: string,
        fd: number,
        force: boolean = false,
        origin: string | null = null,
        props: PropertyInput = {},
    ): void {
        this._run(`receive`, [snapname], () => {
            const status = this._codec.In(props, nvl => {
                return this.lib.Receive(snapname, nvl, origin, force, fd);
            });
            if (status !== 0) {
                throw ClassifyReceive(status, snapname, origin);
            }
        });
    }

    /** True when the dataset, snapshot or bookmark exists. */
    public Exists(name: string): boolean {
        return this.lib.Exists(name);
    }

    /** Runs one operation, recording and announcing its outcome. */
    private _run<T>(operation: string, targets: readonly string[], body: () => T): T {
        try {
            const result = body();
            log.debug(`${operation} completed`, FROM, targets.join(`, `));
            this._publish(EVENT_NAMES.operationSucceeded, { operation, targets: [...targets] });
            return result;
        } catch(err) {
            if (err instanceof AppError) {
                this._metrics.IncFailure(err.code);
                log.warning(`${operation} failed: ${err.message}`, FROM, err.code);
                this._publish(EVENT_NAMES.operationFailed, { operation, targets: [...targets], code: err.code });
            }
            throw err;
        }
    }

    private _publish(
        eventName: typeof EVENT_NAMES.operationSucceeded | typeof EVENT_NAMES.operationFailed,
        payload: OperationEvent,
    ): void {
        if (this._emitEvents) {
            this._eventBus.Emit(eventName, payload);
        }
    }
}
