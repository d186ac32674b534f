//
//
//

import { rmSync } from "fs";

// Temporary files and directories of the current run. An interrupted run
// removes them from its signal handler, where finally blocks do not run.
const pending = new Set<string>();

export function trackTemporary(path: string): void {
    pending.add(path);
}

export function releaseTemporary(path: string): void {
    pending.delete(path);
}

/**
 * Synchronously removes every tracked path.
 */
export function removeTemporaries(): void {
    for (const path of pending) {
        rmSync(path, { recursive: true, force: true });
    }
    pending.clear();
}
