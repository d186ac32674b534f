//
//
//

import { constants } from "fs";
import { access, rename, rm, stat, writeFile } from "fs/promises";
import { basename, dirname, join, resolve } from "path";
import type { Logger } from "winston";
import { type ImageStore, InputError, OutputError, type RenderedImage } from "../domain";
import { releaseTemporary, trackTemporary } from "../utils";

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return undefined;
}

/**
 * ImageStore on the local filesystem.
 */
export class FileImageStore implements ImageStore {
    public constructor(private readonly _logger: Logger) {}

    public async checkInput(path: string): Promise<void> {
        try {
            const stats = await stat(path);
            if (!stats.isFile()) {
                throw new InputError(`${path} is not a file.`);
            }
            await access(path, constants.R_OK);
        } catch (error) {
            if (error instanceof InputError) {
                throw error;
            }
            if (errorCode(error) === "ENOENT") {
                throw new InputError(`Input image ${path} not found.`, { cause: error });
            }
            throw new InputError(`Input image ${path} cannot be read.`, { cause: error });
        }
    }

    public async checkOutput(path: string): Promise<void> {
        const target = resolve(path);
        const parent = dirname(target);

        try {
            const stats = await stat(parent);
            if (!stats.isDirectory()) {
                throw new OutputError(`Output directory ${parent} is not a directory.`);
            }
        } catch (error) {
            if (error instanceof OutputError) {
                throw error;
            }
            throw new OutputError(`Output directory ${parent} does not exist.`, { cause: error });
        }

        try {
            await access(parent, constants.W_OK);
        } catch (error) {
            throw new OutputError(`No write permission in ${parent}.`, { cause: error });
        }

        const existing = await stat(target).catch(() => null);
        if (existing !== null && existing.isDirectory()) {
            throw new OutputError(`Invalid path: ${path} is a directory.`);
        }
    }

    public async write(path: string, image: RenderedImage): Promise<void> {
        const target = resolve(path);
        const temporary = join(dirname(target), `.${basename(target)}.${process.pid}.tmp`);

        trackTemporary(temporary);
        try {
            await writeFile(temporary, image.png);
            await rename(temporary, target);
        } catch (error) {
            await rm(temporary, { force: true });
            const reason = error instanceof Error ? error.message : String(error);
            throw new OutputError(`Error saving file ${path}: ${reason}`, { cause: error });
        } finally {
            releaseTemporary(temporary);
        }

        this._logger.debug(`Wrote ${image.png.length} bytes (${image.width}x${image.height}) to ${target}`);
    }
}
