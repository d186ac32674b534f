//
//
//

/**
 * Pipeline stage in which an error was raised.
 */
export type Stage = "arguments" | "resolution" | "color" | "input" | "font" | "conversion" | "output";

/**
 * Base class for every error the pipeline reports to the user.
 */
export abstract class RenderError extends Error {
    public abstract readonly stage: Stage;

    public constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Thrown when a command-line argument is missing or malformed.
 */
export class InvalidArgumentError extends RenderError {
    public readonly stage = "arguments";
}

/**
 * Thrown when the resolution selection cannot be turned into pixel dimensions.
 */
export class InvalidResolutionError extends RenderError {
    public readonly stage = "resolution";
}

/**
 * Thrown when a color is not a 3 or 6 digit hex string.
 */
export class InvalidColorError extends RenderError {
    public readonly stage = "color";

    public constructor(value: string) {
        super(`Invalid color format: "${value}". Expected RGB or RRGGBB hex digits.`);
    }
}

/**
 * Thrown when the input image cannot be read.
 */
export class InputError extends RenderError {
    public readonly stage = "input";
}

/**
 * Thrown when the font file is missing or cannot be parsed.
 */
export class FontLoadError extends RenderError {
    public readonly stage = "font";
}

/**
 * Thrown when the external converter is missing, fails or returns unusable text.
 */
export class ConversionError extends RenderError {
    public readonly stage = "conversion";
}

/**
 * Thrown when the output path cannot be written.
 */
export class OutputError extends RenderError {
    public readonly stage = "output";
}
