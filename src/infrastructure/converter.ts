//
//
//

import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Logger } from "winston";
import {
    AsciiBlock,
    type AsciiSource,
    ConversionError,
    type Dimensions,
    type GridSize,
    type ToolSettings,
} from "../domain";
import { releaseTemporary, trackTemporary } from "../utils";
import { ImageFitter } from "./magick";
import { type CommandRunner, describeFailure, execFileRunner, formatCommand } from "./process";

const OUTPUT_SUFFIX = "-ascii-art.txt";

export interface ConverterOptions {
    /**
     * Canvas the image is fitted to before conversion. Without it, or without
     * an ImageMagick executable, the image is passed to the converter as is.
     */
    readonly canvas?: Dimensions;

    readonly runner?: CommandRunner;
}

/**
 * AsciiSource backed by the ascii-image-converter executable.
 */
export class ExternalAsciiSource implements AsciiSource {
    private readonly _runner: CommandRunner;

    private readonly _fitter: ImageFitter | null;

    private readonly _canvas: Dimensions | null;

    public constructor(
        private readonly _tools: ToolSettings,
        private readonly _logger: Logger,
        options: ConverterOptions = {},
    ) {
        this._runner = options.runner ?? execFileRunner;
        this._canvas = options.canvas ?? null;
        this._fitter =
            _tools.magickPath !== null
                ? new ImageFitter(_tools.magickPath, this._runner, _tools.timeout, _logger)
                : null;
    }

    public static arguments(image: string, grid: GridSize, braille: boolean, saveDir: string): string[] {
        const args = ["--only-save", "--dimensions", `${grid.columns},${grid.rows}`, "--save-txt", saveDir];
        if (braille) {
            args.push("--braille", "--dither");
        }
        args.push(image);

        return args;
    }

    public async convert(image: string, grid: GridSize, braille: boolean): Promise<AsciiBlock> {
        const workDir = await mkdtemp(join(tmpdir(), "ascii-render-"));
        trackTemporary(workDir);
        try {
            let source = image;
            if (this._fitter !== null && this._canvas !== null) {
                source = await this._fitter.fit(image, this._canvas, workDir);
            }

            const converter = this._tools.converterPath;
            const args = ExternalAsciiSource.arguments(source, grid, braille, workDir);
            this._logger.debug(`Running ${formatCommand(converter, args)}`);
            try {
                await this._runner(converter, args, { timeout: this._tools.timeout });
            } catch (error) {
                throw new ConversionError(`Conversion failed: ${describeFailure(converter, error)}`, {
                    cause: error,
                });
            }

            const text = await this.readOutput(workDir);
            const block = AsciiBlock.fromText(text);
            this._logger.debug(`Converter produced ${block.columnCount}x${block.rowCount} characters`);

            return block;
        } finally {
            await rm(workDir, { recursive: true, force: true });
            releaseTemporary(workDir);
        }
    }

    private async readOutput(workDir: string): Promise<string> {
        const entries = await readdir(workDir);
        const name = entries.find((entry) => entry.endsWith(OUTPUT_SUFFIX));
        if (name === undefined) {
            throw new ConversionError(
                `${this._tools.converterPath} did not write a text file (expected *${OUTPUT_SUFFIX}).`,
            );
        }

        return readFile(join(workDir, name), "utf8");
    }
}
