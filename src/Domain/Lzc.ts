/**
 * Boundary of the external management library (libzfs_core).
 * Every call returns a status code, 0 on success; container arguments are borrowed for the
 * duration of the call and output slots receive a container the caller must release.
 */
import type { NvlistHandle, NvlistSlot } from './Wire.js';

/** Object set types accepted by create, numbered as the external library numbers them. */
export enum ObjsetType {
    ZFS = 2,
    ZVOL = 3,
}

/** Send stream options. */
export const SEND_FLAGS = {
    embedded_data: 1 << 0,
    large_blocks: 1 << 1,
} as const;

export type SendFlag = keyof typeof SEND_FLAGS;

/** A status together with the value the call produced; `value` is meaningful only for status 0. */
export interface StatusWith<T> {
    status: number;
    value: T;
}

export interface LzcLibrary {
    /** lzc_create */
    Create(fsname: string, type: ObjsetType, props: NvlistHandle): number;
    /** lzc_clone */
    Clone(fsname: string, origin: string, props: NvlistHandle): number;
    /** lzc_rollback; value is the snapshot rolled back to */
    Rollback(fsname: string): StatusWith<string>;
    /** lzc_snapshot */
    Snapshot(snaps: NvlistHandle, props: NvlistHandle, errlist: NvlistSlot): number;
    /** lzc_destroy_snaps */
    DestroySnaps(snaps: NvlistHandle, defer: boolean, errlist: NvlistSlot): number;
    /** lzc_bookmark */
    Bookmark(bookmarks: NvlistHandle, errlist: NvlistSlot): number;
    /** lzc_get_bookmarks */
    GetBookmarks(fsname: string, props: NvlistHandle, bookmarks: NvlistSlot): number;
    /** lzc_destroy_bookmarks */
    DestroyBookmarks(bookmarks: NvlistHandle, errlist: NvlistSlot): number;
    /** lzc_snaprange_space; value is in bytes */
    SnaprangeSpace(firstsnap: string, lastsnap: string): StatusWith<bigint>;
    /** lzc_hold */
    Hold(holds: NvlistHandle, cleanupFd: number, errlist: NvlistSlot): number;
    /** lzc_release */
    Release(holds: NvlistHandle, errlist: NvlistSlot): number;
    /** lzc_get_holds */
    GetHolds(snapname: string, holds: NvlistSlot): number;
    /** lzc_send */
    Send(snapname: string, fromsnap: string | null, fd: number, flags: number): number;
    /** lzc_send_space; value is in bytes */
    SendSpace(snapname: string, fromsnap: string | null): StatusWith<bigint>;
    /** lzc_receive */
    Receive(snapname: string, props: NvlistHandle, origin: string | null, force: boolean, fd: number): number;
    /** lzc_exists */
    Exists(name: string): boolean;
}
