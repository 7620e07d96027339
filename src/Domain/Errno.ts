/**
 * Status codes reported by the management library, drawn from the host's errno space.
 */
import { constants } from 'os';
import { getSystemErrorName } from 'util';

const errno = constants.errno;

/** Codes the classifiers distinguish. */
export const Errno = {
    E2BIG: errno.E2BIG,
    EAGAIN: errno.EAGAIN,
    EBADF: errno.EBADF,
    EBUSY: errno.EBUSY,
    EDQUOT: errno.EDQUOT,
    EEXIST: errno.EEXIST,
    EINVAL: errno.EINVAL,
    ENAMETOOLONG: errno.ENAMETOOLONG,
    ENODEV: errno.ENODEV,
    ENOENT: errno.ENOENT,
    ENOMEM: errno.ENOMEM,
    ENOSPC: errno.ENOSPC,
    ENOTSUP: errno.ENOTSUP,
    EROFS: errno.EROFS,
    ETXTBSY: errno.ETXTBSY,
    EXDEV: errno.EXDEV,
    EIO: errno.EIO,
} as const;

/**
 * Symbolic name of a status code, e.g. 'ENOENT'; falls back to the number for codes the host does not know.
 * @param status number - Positive errno value
 */
export function StatusName(status: number): string {
    if (status <= 0) {
        return String(status);
    }
    try {
        return getSystemErrorName(-status);
    } catch {
        return String(status);
    }
}
