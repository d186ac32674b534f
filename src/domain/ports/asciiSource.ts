//
//
//

import type { AsciiBlock, GridSize } from "../structs";

export interface AsciiSource {
    /**
     * Converts an image into character art.
     * @param image Path of the input image.
     * @param grid Number of columns and rows to produce.
     * @param braille Whether to use Braille characters with dithering.
     * @returns The converted block. Its shape may differ from the grid; callers fit it.
     * @throws ConversionError if the conversion cannot be performed.
     */
    convert(image: string, grid: GridSize, braille: boolean): Promise<AsciiBlock>;
}
