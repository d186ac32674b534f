//
//
//

import { extname } from "path";
import type { Logger } from "winston";
import { ConversionError } from "./errors";
import { BRAILLE_PATTERNS, BRAILLE_REFERENCE_GLYPH, FontFace, REFERENCE_GLYPH } from "./font";
import type { AsciiSource, ImageStore } from "./ports";
import { CanvasRenderer } from "./renderer";
import { gridFor } from "./resolution";
import type { AsciiBlock, Dimensions, GlyphCell, GridSize, RenderSettings } from "./structs";

export interface RenderJob {
    readonly input: string;

    readonly output: string;

    readonly dimensions: Dimensions;

    readonly settings: RenderSettings;
}

export interface RenderResult {
    readonly output: string;

    readonly grid: GridSize;

    readonly cell: GlyphCell;

    readonly width: number;

    readonly height: number;
}

/**
 * Runs one conversion: checks paths, measures the font, asks the source for
 * characters, draws them and stores the image. Any failure aborts the run
 * before the output is touched.
 */
export class Pipeline {
    private readonly _renderer: CanvasRenderer;

    public constructor(
        private readonly _source: AsciiSource,
        private readonly _store: ImageStore,
        private readonly _logger: Logger,
    ) {
        this._renderer = new CanvasRenderer(_logger);
    }

    public async run(job: RenderJob): Promise<RenderResult> {
        const { input, output, dimensions, settings } = job;

        await this._store.checkInput(input);
        await this._store.checkOutput(output);
        if (extname(output).toLowerCase() !== ".png") {
            this._logger.warn(`Output ${output} does not end with .png; the file is written as PNG anyway`);
        }

        // Braille output is sized and checked against the Braille block only
        const reference = settings.braille ? BRAILLE_REFERENCE_GLYPH : REFERENCE_GLYPH;
        const face = await FontFace.load(settings.fontPath, settings.fontSize, reference);
        if (!face.isMonospaced(settings.braille ? BRAILLE_PATTERNS : undefined)) {
            this._logger.warn(`Font ${settings.fontPath} is not monospaced; glyphs are placed on a fixed grid`);
        }

        const grid = gridFor(dimensions, face.cell);
        this._logger.debug(
            `Canvas ${dimensions.toString()}, cell ${face.cell.width}x${face.cell.height}, grid ${grid.toString()}`,
        );

        const converted = await this._source.convert(input, grid, settings.braille);
        const block = this.fitBlock(converted, grid, settings.strictGrid);

        const image = this._renderer.render(block, face, settings.palette, {
            canvas: settings.exact ? dimensions : undefined,
            antialias: settings.antialias,
        });
        await this._store.write(output, image);

        return { output, grid, cell: face.cell, width: image.width, height: image.height };
    }

    /**
     * Brings the converter output to the grid shape, or rejects it in strict mode.
     */
    public fitBlock(block: AsciiBlock, grid: GridSize, strict: boolean): AsciiBlock {
        if (block.isEmpty) {
            throw new ConversionError("Converter returned no characters.");
        }

        const report = block.fit(grid);
        if (!report.reshaped) {
            return report.block;
        }

        const shape = `${block.columnCount}x${block.rowCount}`;
        if (strict) {
            throw new ConversionError(`Converter returned a ${shape} block, expected ${grid.toString()}.`);
        }

        this._logger.warn(`Converter returned a ${shape} block, fitting it to ${grid.toString()}`);
        return report.block;
    }
}
