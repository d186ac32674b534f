//
//
//

import type { RenderedImage } from "../renderer";

export interface ImageStore {
    /**
     * Checks that the input image exists and can be read.
     * @throws InputError otherwise.
     */
    checkInput(path: string): Promise<void>;

    /**
     * Checks that the output can be created: its directory exists and is
     * writable, and the path is not a directory.
     * @throws OutputError otherwise.
     */
    checkOutput(path: string): Promise<void>;

    /**
     * Writes the image in one step, so that a reader never sees a partial file.
     * @throws OutputError if the file cannot be written.
     */
    write(path: string, image: RenderedImage): Promise<void>;
}
