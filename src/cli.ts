//
//
//

import commandLineArgs, { type CommandLineOptions, type OptionDefinition } from "command-line-args";
import { resolve } from "path";
import type { Logger } from "winston";
import {
    type AsciiSource,
    type Dimensions,
    InvalidArgumentError,
    Palette,
    Pipeline,
    type RenderJob,
    RenderError,
    type RenderSettings,
    type ToolSettings,
    resolveResolution,
} from "./domain";
import { ExternalAsciiSource, FileImageStore } from "./infrastructure";
import { LOG_LEVELS, createRunLogger, parseBoolean, parseNonNegativeInteger, readVariable } from "./utils";

export const DEFAULT_FONT = resolve(__dirname, "..", "assets", "fonts", "SourceCodePro-Regular.ttf");

// used with --braille when no font is given; covers the whole Braille block
export const DEFAULT_BRAILLE_FONT = resolve(__dirname, "..", "assets", "fonts", "DejaVuSans.ttf");

export const DEFAULTS = {
    fontSize: 12,
    color: "ffffff",
    background: "000000",
    converterPath: "ascii-image-converter",
    magickPath: "magick",
    timeout: 0,
    logLevel: "warn",
} as const;

export const OPTION_DEFINITIONS: OptionDefinition[] = [
    { name: "input", alias: "i", type: String },
    { name: "preset", alias: "p", type: String },
    { name: "resolution", alias: "r", type: String },
    { name: "font", alias: "f", type: String },
    { name: "size", alias: "s", type: String },
    { name: "color", alias: "c", type: String },
    { name: "bg", alias: "B", type: String },
    { name: "braille", alias: "b", type: Boolean },
    { name: "exact", alias: "e", type: Boolean },
    { name: "output", alias: "o", type: String },
    { name: "help", alias: "h", type: Boolean },
];

export const USAGE = `Render an image as ASCII art into a PNG.

Usage:
  ascii-render -i <image> (-p <preset> | -r <WIDTHxHEIGHT>) -o <output.png> [options]

Options:
  -i, --input       Input image (required)
  -p, --preset      Resolution preset: 1080p, 720p, 4k
  -r, --resolution  Custom resolution WIDTHxHEIGHT, e.g. 1920x1080
  -f, --font        TTF/OTF font file (default: bundled Source Code Pro, or
                    DejaVu Sans with --braille; a Braille font must cover U+28FF)
  -s, --size        Font size in pixels per em (default: 12)
  -c, --color       Text color RGB or RRGGBB without "#" (default: ffffff)
  -B, --bg          Background color RGB or RRGGBB without "#" (default: 000000)
  -b, --braille     Use Braille characters with dithering
  -e, --exact       Make the canvas exactly the requested resolution
  -o, --output      Output PNG path (required)
  -h, --help        Show this message

Environment:
  ASCII_RENDER_FONT, ASCII_RENDER_SIZE, ASCII_RENDER_COLOR, ASCII_RENDER_BG,
  ASCII_CONVERTER_PATH, MAGICK_PATH (empty disables fitting), CONVERTER_TIMEOUT_MS,
  STRICT_GRID, ANTIALIAS, LOG_LEVEL
`;

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

export interface CliArguments {
    readonly input?: string;
    readonly preset?: string;
    readonly resolution?: string;
    readonly font?: string;
    readonly size?: string;
    readonly color?: string;
    readonly bg?: string;
    readonly braille: boolean;
    readonly exact: boolean;
    readonly output?: string;
    readonly help: boolean;
}

function stringOption(options: CommandLineOptions, name: string): string | undefined {
    const value: unknown = options[name];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== "string") {
        throw new InvalidArgumentError(`Option --${name} requires a value.`);
    }
    return value;
}

function booleanOption(options: CommandLineOptions, name: string): boolean {
    return options[name] === true;
}

/**
 * Parses command-line arguments (without the node and script entries).
 * @throws InvalidArgumentError for unknown options, repeated options or missing values.
 */
export function parseArguments(argv: string[]): CliArguments {
    let options: CommandLineOptions;
    try {
        options = commandLineArgs(OPTION_DEFINITIONS, { argv });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new InvalidArgumentError(`${message}. Run with --help for usage.`, { cause: error });
    }

    return {
        input: stringOption(options, "input"),
        preset: stringOption(options, "preset"),
        resolution: stringOption(options, "resolution"),
        font: stringOption(options, "font"),
        size: stringOption(options, "size"),
        color: stringOption(options, "color"),
        bg: stringOption(options, "bg"),
        braille: booleanOption(options, "braille"),
        exact: booleanOption(options, "exact"),
        output: stringOption(options, "output"),
        help: booleanOption(options, "help"),
    };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface RunConfig {
    readonly job: RenderJob;

    readonly tools: ToolSettings;

    readonly logLevel: string;
}

function parseSize(value: string): number {
    const size = parseNonNegativeInteger(value);
    if (size === null || size === 0) {
        throw new InvalidArgumentError(`Font size must be a positive integer (got "${value}").`);
    }
    return size;
}

function booleanVariable(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = readVariable(env, name);
    if (raw === undefined) {
        return fallback;
    }
    const value = parseBoolean(raw);
    if (value === null) {
        throw new InvalidArgumentError(`${name} must be true or false (got "${raw}").`);
    }
    return value;
}

function readTools(env: NodeJS.ProcessEnv): ToolSettings {
    const timeoutRaw = readVariable(env, "CONVERTER_TIMEOUT_MS");
    const timeout = timeoutRaw === undefined ? DEFAULTS.timeout : parseNonNegativeInteger(timeoutRaw);
    if (timeout === null) {
        throw new InvalidArgumentError(`CONVERTER_TIMEOUT_MS must be a non-negative integer (got "${timeoutRaw}").`);
    }

    // an explicitly empty MAGICK_PATH turns fitting off
    const magick = env.MAGICK_PATH;
    const magickPath = magick === undefined ? DEFAULTS.magickPath : magick.trim() === "" ? null : magick.trim();

    return {
        converterPath: readVariable(env, "ASCII_CONVERTER_PATH") ?? DEFAULTS.converterPath,
        magickPath,
        timeout,
    };
}

/**
 * Validates the arguments and merges them over the environment and the
 * built-in defaults. Command-line values win over environment values.
 */
export function buildConfig(args: CliArguments, env: NodeJS.ProcessEnv): RunConfig {
    if (args.input === undefined) {
        throw new InvalidArgumentError("An input image (-i) is required.");
    }
    if (args.output === undefined) {
        throw new InvalidArgumentError("An output path (-o) is required.");
    }

    const dimensions: Dimensions = resolveResolution({ preset: args.preset, custom: args.resolution });

    const palette = Palette.fromHex(
        args.color ?? readVariable(env, "ASCII_RENDER_COLOR") ?? DEFAULTS.color,
        args.bg ?? readVariable(env, "ASCII_RENDER_BG") ?? DEFAULTS.background,
    );

    const sizeValue = args.size ?? readVariable(env, "ASCII_RENDER_SIZE");
    const fontSize = sizeValue === undefined ? DEFAULTS.fontSize : parseSize(sizeValue);

    const settings: RenderSettings = {
        fontPath:
            args.font ?? readVariable(env, "ASCII_RENDER_FONT") ?? (args.braille ? DEFAULT_BRAILLE_FONT : DEFAULT_FONT),
        fontSize,
        palette,
        braille: args.braille,
        exact: args.exact,
        antialias: booleanVariable(env, "ANTIALIAS", true),
        strictGrid: booleanVariable(env, "STRICT_GRID", false),
    };

    const logLevel = readVariable(env, "LOG_LEVEL") ?? DEFAULTS.logLevel;
    if (!LOG_LEVELS.includes(logLevel)) {
        throw new InvalidArgumentError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${logLevel}").`);
    }

    return {
        job: { input: args.input, output: args.output, dimensions, settings },
        tools: readTools(env),
        logLevel,
    };
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

export interface RunDependencies {
    readonly createLogger?: (level: string) => Logger;

    readonly createSource?: (tools: ToolSettings, logger: Logger, canvas: Dimensions) => AsciiSource;
}

/**
 * Runs the command and returns the process exit code. Failures are reported
 * on stderr as a single line naming the stage that failed.
 */
export async function run(
    argv: string[],
    env: NodeJS.ProcessEnv,
    dependencies: RunDependencies = {},
): Promise<number> {
    try {
        const args = parseArguments(argv);
        if (args.help) {
            // eslint-disable-next-line no-console
            console.log(USAGE);
            return 0;
        }

        const config = buildConfig(args, env);
        const logger = (dependencies.createLogger ?? createRunLogger)(config.logLevel);
        const canvas = config.job.dimensions;
        const source =
            dependencies.createSource?.(config.tools, logger, canvas) ??
            new ExternalAsciiSource(config.tools, logger, { canvas });

        const pipeline = new Pipeline(source, new FileImageStore(logger), logger);
        const result = await pipeline.run(config.job);

        logger.info(
            `Rendered ${result.grid.toString()} characters in ${result.cell.width}x${result.cell.height} cells`,
        );
        // eslint-disable-next-line no-console
        console.log(`Successfully saved at ${result.output}`);
        return 0;
    } catch (error) {
        if (error instanceof RenderError) {
            // eslint-disable-next-line no-console
            console.error(`Error [${error.stage}]: ${error.message}`);
        } else {
            const message = error instanceof Error ? error.message : String(error);
            // eslint-disable-next-line no-console
            console.error(`Error [internal]: ${message}`);
        }
        return 1;
    }
}
