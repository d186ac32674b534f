//
//
//

import { InvalidResolutionError } from "./errors";
import { Dimensions, GlyphCell, GridSize } from "./structs";

export const PRESETS = {
    "1080p": { width: 1920, height: 1080 },
    "720p": { width: 1280, height: 720 },
    "4k": { width: 3840, height: 2160 },
} as const;

export type Preset = keyof typeof PRESETS;

const CUSTOM_RESOLUTION = /^(\d+)x(\d+)$/i;

export interface ResolutionSelection {
    readonly preset?: string;

    readonly custom?: string;
}

export function isPreset(value: string): value is Preset {
    return Object.prototype.hasOwnProperty.call(PRESETS, value);
}

/**
 * Parses a WIDTHxHEIGHT string.
 * @throws InvalidResolutionError if the string is malformed or a side is not positive.
 */
export function parseResolution(value: string): Dimensions {
    const match = CUSTOM_RESOLUTION.exec(value.trim());
    if (match === null) {
        throw new InvalidResolutionError(
            `Resolution must be in format WIDTHxHEIGHT, e.g. 1920x1080 (got "${value}").`,
        );
    }

    const dimensions = Dimensions.new(parseInt(match[1], 10), parseInt(match[2], 10));
    if (dimensions === null) {
        throw new InvalidResolutionError(`Resolution sides must be positive integers (got "${value}").`);
    }

    return dimensions;
}

/**
 * Resolves exactly one of a preset name or a custom resolution into pixel dimensions.
 */
export function resolveResolution(selection: ResolutionSelection): Dimensions {
    const { preset, custom } = selection;

    if (preset !== undefined && custom !== undefined) {
        throw new InvalidResolutionError("Use either a preset or a custom resolution, not both.");
    }

    if (preset !== undefined) {
        if (!isPreset(preset)) {
            const names = Object.keys(PRESETS).join(", ");
            throw new InvalidResolutionError(`Unknown preset "${preset}". Expected one of: ${names}.`);
        }
        const { width, height } = PRESETS[preset];
        return parseResolution(`${width}x${height}`);
    }

    if (custom !== undefined) {
        return parseResolution(custom);
    }

    throw new InvalidResolutionError("A preset (-p) or a custom resolution (-r) is required.");
}

/**
 * Number of whole glyph cells that fit in the dimensions.
 * @throws InvalidResolutionError if not even one cell fits.
 */
export function gridFor(dimensions: Dimensions, cell: GlyphCell): GridSize {
    const columns = Math.floor(dimensions.width / cell.width);
    const rows = Math.floor(dimensions.height / cell.height);

    if (columns === 0 || rows === 0) {
        throw new InvalidResolutionError(
            `Resolution ${dimensions.toString()} is smaller than one ${cell.width}x${cell.height} glyph cell.`,
        );
    }

    return new GridSize(columns, rows);
}
