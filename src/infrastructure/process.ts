//
//
//

import { execFile } from "child_process";
import { promisify } from "util";

export interface CommandOutput {
    readonly stdout: string;

    readonly stderr: string;
}

export interface RunOptions {
    /**
     * Milliseconds before the process is killed; 0 waits forever.
     */
    readonly timeout: number;
}

/**
 * Runs an executable without a shell and resolves with its output, or
 * rejects if it cannot be started or exits with a non-zero status.
 */
export type CommandRunner = (file: string, args: readonly string[], options: RunOptions) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

export const execFileRunner: CommandRunner = async (file, args, options) => {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
        timeout: options.timeout,
        encoding: "utf8",
        maxBuffer: 64 * 1024 * 1024,
    });

    return { stdout, stderr };
};

interface ExecFailure {
    code?: string | number | null;
    killed?: boolean;
    signal?: string | null;
    stderr?: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
    return error instanceof Error;
}

/**
 * Turns a rejected command into a one-line explanation.
 */
export function describeFailure(file: string, error: unknown): string {
    if (!isExecFailure(error)) {
        return `${file} failed: ${String(error)}`;
    }
    if (error.code === "ENOENT") {
        return `${file} was not found. Is it installed and on the PATH?`;
    }
    if (error.killed === true || (error.signal !== undefined && error.signal !== null)) {
        return `${file} was stopped (${error.signal ?? "timeout"}).`;
    }

    const stderr = error.stderr?.trim() ?? "";
    if (typeof error.code === "number") {
        return `${file} exited with status ${error.code}${stderr.length > 0 ? `: ${stderr}` : "."}`;
    }

    return `${file} failed: ${error.message}`;
}

export function formatCommand(file: string, args: readonly string[]): string {
    return [file, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
