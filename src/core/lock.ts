// Single-writer lock for index rebuilds
// A pid file next to the store; a lock left behind by a dead process is taken over.

import fs from 'node:fs'
import { IndexLockError, systemErrorCode } from './errors.js'

export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0)
        return true
    } catch (error) {
        // EPERM: exists but owned by someone else
        return systemErrorCode(error) === 'EPERM'
    }
}

export function readLockPid(lockPath: string): number | undefined {
    try {
        const pid = parseInt(fs.readFileSync(lockPath, 'utf8').trim(), 10)
        return Number.isNaN(pid) ? undefined : pid
    } catch (error) {
        if (systemErrorCode(error) === 'ENOENT') return undefined
        throw error
    }
}

export function isLocked(lockPath: string): boolean {
    const pid = readLockPid(lockPath)
    return pid !== undefined && isProcessAlive(pid)
}

/**
 * Take the rebuild lock or throw IndexLockError.
 *
 * @returns a release function; call it in a `finally`
 */
export function acquireRebuildLock(lockPath: string): () => void {
    for (let attempt = 0; attempt < 2; attempt++) {
        try {
            const fd = fs.openSync(lockPath, 'wx')
            try {
                fs.writeSync(fd, String(process.pid))
            } finally {
                fs.closeSync(fd)
            }
            return () => {
                if (readLockPid(lockPath) === process.pid) fs.rmSync(lockPath, { force: true })
            }
        } catch (error) {
            if (systemErrorCode(error) !== 'EEXIST') throw error
            const holder = readLockPid(lockPath)
            if (holder !== undefined && isProcessAlive(holder)) {
                throw new IndexLockError(lockPath, holder)
            }
            fs.rmSync(lockPath, { force: true })
        }
    }
    throw new IndexLockError(lockPath, readLockPid(lockPath) ?? -1)
}
