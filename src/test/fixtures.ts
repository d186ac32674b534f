//
//
//

import { writeFile } from "fs/promises";
import { join, resolve } from "path";
import { Font, Glyph, Path } from "opentype.js";
import { PNG } from "pngjs";
import type { Logger } from "winston";
import { createRunLogger } from "../utils";

// Test font geometry, in font units of a 1000 unit em. At 20 pixels per em a
// cell is 10x20 pixels, the baseline sits 16 pixels below the cell top and
// every inked glyph is the rectangle x 2..8, y 4..16 of its cell.
export const BUNDLED_FONT = resolve(__dirname, "..", "..", "assets", "fonts", "SourceCodePro-Regular.ttf");
export const BUNDLED_BRAILLE_FONT = resolve(__dirname, "..", "..", "assets", "fonts", "DejaVuSans.ttf");

export const UNITS_PER_EM = 1000;
export const ADVANCE = 500;
export const ASCENDER = 800;
export const DESCENDER = -200;

function box(x0: number, y0: number, x1: number, y1: number): Path {
    const path = new Path();
    path.moveTo(x0, y0);
    path.lineTo(x1, y0);
    path.lineTo(x1, y1);
    path.lineTo(x0, y1);
    path.close();
    return path;
}

export interface TestFontOptions {
    /**
     * Characters that get the ink rectangle.
     */
    readonly inked?: string;

    /**
     * Characters mapped with a wider advance, making the font proportional.
     */
    readonly wide?: string;
}

/**
 * Builds a small font in memory. Space has no ink, every other listed
 * character is a 300x600 unit rectangle standing on the baseline.
 */
export function buildTestFont(options: TestFontOptions = {}): Font {
    const inked = options.inked ?? "ABCDM#@";
    const glyphs = [
        new Glyph({ name: ".notdef", advanceWidth: ADVANCE, path: new Path() }),
        new Glyph({ name: "space", unicode: 0x20, advanceWidth: ADVANCE, path: new Path() }),
    ];
    for (const char of inked) {
        glyphs.push(
            new Glyph({
                name: `uni${char.charCodeAt(0).toString(16).toUpperCase().padStart(4, "0")}`,
                unicode: char.charCodeAt(0),
                advanceWidth: ADVANCE,
                path: box(100, 0, 400, 600),
            }),
        );
    }
    for (const char of options.wide ?? "") {
        glyphs.push(
            new Glyph({
                name: `wide${char.charCodeAt(0)}`,
                unicode: char.charCodeAt(0),
                advanceWidth: ADVANCE * 2,
                path: box(100, 0, 900, 600),
            }),
        );
    }

    return new Font({
        familyName: "Test Mono",
        styleName: "Regular",
        unitsPerEm: UNITS_PER_EM,
        ascender: ASCENDER,
        descender: DESCENDER,
        glyphs,
    });
}

/**
 * Writes a font built by buildTestFont to disk.
 */
export async function writeTestFont(dir: string, options: TestFontOptions = {}): Promise<string> {
    const path = join(dir, "test-mono.otf");
    await writeFile(path, Buffer.from(buildTestFont(options).toArrayBuffer()));
    return path;
}

export function silentLogger(): Logger {
    return createRunLogger("debug", true);
}

export function decodePng(data: Buffer): PNG {
    return PNG.sync.read(data);
}

export function pixelAt(png: PNG, x: number, y: number): [number, number, number, number] {
    const index = (y * png.width + x) * 4;
    return [png.data[index], png.data[index + 1], png.data[index + 2], png.data[index + 3]];
}
