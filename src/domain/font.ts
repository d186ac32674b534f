//
//
//

import { readFile, stat } from "fs/promises";
import { Font, parse } from "opentype.js";
import { FontLoadError } from "./errors";
import { GlyphCell } from "./structs";

/**
 * Glyph whose advance defines the cell width.
 */
export const REFERENCE_GLYPH = "M";

/**
 * Reference glyph in Braille mode, where every drawn character is a Braille pattern.
 */
export const BRAILLE_REFERENCE_GLYPH = "\u28ff";

export const BRAILLE_PATTERNS: readonly string[] = Array.from({ length: 256 }, (_, i) =>
    String.fromCodePoint(0x2800 + i),
);

// absorbs floating point noise before rounding up to whole pixels
const EPSILON = 1e-6;

function ceilPixels(value: number): number {
    return Math.max(1, Math.ceil(value - EPSILON));
}

function codePoint(char: string): string {
    return `U+${(char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0")}`;
}

// glyph 0 is .notdef
function mapsChar(font: Font, char: string): boolean {
    return font.charToGlyphIndex(char) > 0;
}

/**
 * Whether a character is drawn as an empty cell. The empty Braille pattern
 * counts as blank so fonts without Braille do not fill it with .notdef.
 */
export function isBlank(char: string): boolean {
    return /^[\s\p{Cc}\p{Cf}\u2800]$/u.test(char);
}

/**
 * A font loaded at a fixed pixel size, with the monospace cell derived from it.
 */
export class FontFace {
    public readonly cell: GlyphCell;

    /**
     * Distance in pixels from the top of a cell to the baseline.
     */
    public readonly baseline: number;

    private readonly _scale: number;

    private constructor(
        private readonly _font: Font,
        public readonly size: number,
        reference: string,
    ) {
        this._scale = size / _font.unitsPerEm;

        const advance = _font.charToGlyph(reference).advanceWidth ?? 0;
        if (advance <= 0) {
            throw new FontLoadError(`Font has no advance width for ${codePoint(reference)}.`);
        }

        const lineHeight = _font.ascender - _font.descender;
        if (lineHeight <= 0) {
            throw new FontLoadError("Font has no vertical extent (ascender - descender <= 0).");
        }

        this.cell = new GlyphCell(ceilPixels(advance * this._scale), ceilPixels(lineHeight * this._scale));
        this.baseline = _font.ascender * this._scale;
    }

    /**
     * Loads a TrueType or OpenType file at the given size in pixels per em.
     * The reference glyph sizes the cells and must be in the font.
     * @throws FontLoadError if the file is missing, is not a font or lacks the reference glyph.
     */
    public static async load(path: string, size: number, reference = REFERENCE_GLYPH): Promise<FontFace> {
        let data: Buffer;
        try {
            const stats = await stat(path);
            if (!stats.isFile()) {
                throw new FontLoadError(`Font path ${path} is not a file.`);
            }
            data = await readFile(path);
        } catch (error) {
            if (error instanceof FontLoadError) {
                throw error;
            }
            throw new FontLoadError(`Font file ${path} could not be read: ${describe(error)}`, { cause: error });
        }

        let font: Font;
        try {
            font = parse(data.buffer.slice(data.byteOffset, data.byteOffset + data.byteLength));
        } catch (error) {
            throw new FontLoadError(`Failed to load font ${path}: ${describe(error)}`, { cause: error });
        }

        if (!mapsChar(font, reference)) {
            throw new FontLoadError(`Font ${path} has no glyph for ${codePoint(reference)}.`);
        }

        return FontFace.fromFont(font, size, reference);
    }

    public static fromFont(font: Font, size: number, reference = REFERENCE_GLYPH): FontFace {
        if (!Number.isFinite(size) || size <= 0) {
            throw new RangeError(`Font size must be positive (got ${size}).`);
        }
        if (!mapsChar(font, reference)) {
            throw new FontLoadError(`Font has no glyph for ${codePoint(reference)}.`);
        }

        return new FontFace(font, size, reference);
    }

    public hasChar(char: string): boolean {
        return mapsChar(this._font, char);
    }

    /**
     * Whether the glyphs share one advance width. With chars, only those the
     * font maps are compared; otherwise every mapped glyph with an advance.
     */
    public isMonospaced(chars?: Iterable<string>): boolean {
        const advances = new Set<number>();
        if (chars !== undefined) {
            for (const char of chars) {
                if (this.hasChar(char)) {
                    advances.add(this._font.charToGlyph(char).advanceWidth ?? 0);
                }
            }
            return advances.size <= 1;
        }

        for (let i = 0; i < this._font.glyphs.length; i += 1) {
            const glyph = this._font.glyphs.get(i);
            const advance = glyph.advanceWidth ?? 0;
            if (glyph.unicodes.length > 0 && advance > 0) {
                advances.add(advance);
            }
        }

        return advances.size <= 1;
    }

    /**
     * SVG path data of one character with its left edge at x and its baseline at y.
     * Blank characters produce an empty string.
     */
    public outline(char: string, x: number, y: number): string {
        if (isBlank(char)) {
            return "";
        }

        return this._font.charToGlyph(char).getPath(x, y, this.size).toPathData(2);
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
