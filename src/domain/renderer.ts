//
//
//

import { Resvg } from "@resvg/resvg-js";
import type { Logger } from "winston";
import { type FontFace, isBlank } from "./font";
import { AsciiBlock, Dimensions, Palette } from "./structs";

export interface RenderOptions {
    /**
     * Canvas size. Defaults to the extent of the grid; a larger canvas leaves
     * background to the right and below the grid.
     */
    readonly canvas?: Dimensions;

    readonly antialias?: boolean;
}

/**
 * A PNG held in memory until it is written to disk.
 */
export interface RenderedImage {
    readonly width: number;

    readonly height: number;

    readonly png: Buffer;
}

export class CanvasRenderer {
    public constructor(private readonly _logger: Logger) {}

    /**
     * Draws every character of the block in its cell, foreground on background.
     */
    public render(block: AsciiBlock, face: FontFace, palette: Palette, options: RenderOptions = {}): RenderedImage {
        const { cell } = face;
        const gridWidth = Math.max(1, block.columnCount * cell.width);
        const gridHeight = Math.max(1, block.rowCount * cell.height);
        const width = Math.max(gridWidth, options.canvas?.width ?? 0);
        const height = Math.max(gridHeight, options.canvas?.height ?? 0);

        const svg = this.toSvg(block, face, palette, width, height, options.antialias ?? true);
        const rendered = new Resvg(svg, {
            fitTo: { mode: "original" },
            font: { loadSystemFonts: false },
        }).render();

        this._logger.debug(`Rendered ${block.columnCount}x${block.rowCount} cells onto ${width}x${height} canvas`);

        return { width: rendered.width, height: rendered.height, png: rendered.asPng() };
    }

    /**
     * Builds the SVG document: a background rectangle and one path holding
     * every glyph outline.
     */
    public toSvg(
        block: AsciiBlock,
        face: FontFace,
        palette: Palette,
        width: number,
        height: number,
        antialias: boolean,
    ): string {
        const outlines: string[] = [];
        const missing = new Set<string>();

        let r = 0;
        for (const row of block.rows()) {
            const baseline = r * face.cell.height + face.baseline;
            row.forEach((char, c) => {
                if (isBlank(char)) {
                    return;
                }
                if (!face.hasChar(char)) {
                    missing.add(char);
                }
                const outline = face.outline(char, c * face.cell.width, baseline);
                if (outline.length > 0) {
                    outlines.push(outline);
                }
            });
            r += 1;
        }

        if (missing.size > 0) {
            const sample = [...missing].slice(0, 10).join("");
            this._logger.warn(`Font has no glyph for ${missing.size} character(s) (${sample}); drawing .notdef instead`);
        }

        const shapeRendering = antialias ? "geometricPrecision" : "crispEdges";
        const parts = [
            `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
            `<rect x="0" y="0" width="${width}" height="${height}" fill="${palette.background.toHex()}"/>`,
        ];
        if (outlines.length > 0) {
            parts.push(
                `<path fill="${palette.foreground.toHex()}" shape-rendering="${shapeRendering}" d="${outlines.join("")}"/>`,
            );
        }
        parts.push("</svg>");

        return parts.join("");
    }
}
