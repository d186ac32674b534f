//
//
//

import { join } from "path";
import type { Logger } from "winston";
import { ConversionError, type Dimensions } from "../domain";
import { type CommandRunner, describeFailure, formatCommand } from "./process";

/**
 * Scales an image to cover the canvas and crops the overflow around the
 * center, so the converter sees the same aspect ratio as the canvas.
 */
export class ImageFitter {
    public constructor(
        private readonly _magickPath: string,
        private readonly _runner: CommandRunner,
        private readonly _timeout: number,
        private readonly _logger: Logger,
    ) {}

    public static arguments(input: string, canvas: Dimensions, output: string): string[] {
        const size = canvas.toString();
        return [input, "-resize", `${size}^`, "-gravity", "center", "-extent", size, output];
    }

    /**
     * @returns Path of the fitted image inside the working directory.
     */
    public async fit(input: string, canvas: Dimensions, workDir: string): Promise<string> {
        const output = join(workDir, "cropped.png");
        const args = ImageFitter.arguments(input, canvas, output);

        this._logger.debug(`Running ${formatCommand(this._magickPath, args)}`);
        try {
            await this._runner(this._magickPath, args, { timeout: this._timeout });
        } catch (error) {
            throw new ConversionError(`Fitting the image failed: ${describeFailure(this._magickPath, error)}`, {
                cause: error,
            });
        }

        return output;
    }
}
