//
//
//

import { Palette } from "./color";

/**
 * Explicit configuration of one rendering run.
 */
export interface RenderSettings {
    readonly fontPath: string;

    readonly fontSize: number;

    readonly palette: Palette;

    /**
     * Ask the converter for Braille characters with dithering.
     */
    readonly braille: boolean;

    /**
     * Size the canvas to the requested resolution instead of the grid extent.
     */
    readonly exact: boolean;

    readonly antialias: boolean;

    /**
     * Fail instead of trimming/padding when the converter output has the wrong shape.
     */
    readonly strictGrid: boolean;
}

/**
 * Location and limits of the external programs.
 */
export interface ToolSettings {
    readonly converterPath: string;

    /**
     * ImageMagick executable used to fit the image; null skips fitting.
     */
    readonly magickPath: string | null;

    /**
     * Subprocess timeout in milliseconds, 0 means no timeout.
     */
    readonly timeout: number;
}
