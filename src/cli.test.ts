import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_BRAILLE_FONT, DEFAULT_FONT, USAGE, buildConfig, parseArguments, run, type RunDependencies } from "./cli";
import {
    AsciiBlock,
    type AsciiSource,
    type Dimensions,
    type GridSize,
    InvalidArgumentError,
    InvalidColorError,
    InvalidResolutionError,
    type ToolSettings,
} from "./domain";
import { decodePng, silentLogger, writeTestFont } from "./test/fixtures";

describe("parseArguments", () => {
    it("reads short and long options", () => {
        const args = parseArguments(["-i", "in.jpg", "--preset", "720p", "-o", "out.png", "-b", "-e", "-B", "101010"]);

        expect(args).toEqual({
            input: "in.jpg",
            preset: "720p",
            resolution: undefined,
            font: undefined,
            size: undefined,
            color: undefined,
            bg: "101010",
            braille: true,
            exact: true,
            output: "out.png",
            help: false,
        });
    });

    it("rejects unknown options", () => {
        expect(() => parseArguments(["--frobnicate"])).toThrow(InvalidArgumentError);
    });

    it("rejects an option without its value", () => {
        expect(() => parseArguments(["-o", "out.png", "-i"])).toThrow(
            new InvalidArgumentError("Option --input requires a value."),
        );
    });
});

describe("buildConfig", () => {
    const base = parseArguments(["-i", "in.jpg", "-p", "1080p", "-o", "out.png"]);

    it("falls back to the built-in defaults", () => {
        const { job, tools, logLevel } = buildConfig(base, {});

        expect(job.dimensions.toString()).toBe("1920x1080");
        expect(job.settings.fontPath).toBe(DEFAULT_FONT);
        expect(job.settings.fontSize).toBe(12);
        expect(job.settings.palette.foreground.toHex()).toBe("#ffffff");
        expect(job.settings.palette.background.toHex()).toBe("#000000");
        expect(job.settings.antialias).toBe(true);
        expect(job.settings.strictGrid).toBe(false);
        expect(tools).toEqual({ converterPath: "ascii-image-converter", magickPath: "magick", timeout: 0 });
        expect(logLevel).toBe("warn");
    });

    it("switches the default font in Braille mode", () => {
        const braille = parseArguments(["-i", "in.jpg", "-p", "720p", "-o", "out.png", "-b"]);

        expect(buildConfig(braille, {}).job.settings.fontPath).toBe(DEFAULT_BRAILLE_FONT);
        expect(buildConfig(braille, { ASCII_RENDER_FONT: "/fonts/dots.ttf" }).job.settings.fontPath).toBe(
            "/fonts/dots.ttf",
        );
    });

    it("reads the environment", () => {
        const { job, tools, logLevel } = buildConfig(base, {
            ASCII_RENDER_FONT: "/fonts/mono.ttf",
            ASCII_RENDER_SIZE: "16",
            ASCII_RENDER_COLOR: "0f0",
            ASCII_RENDER_BG: "112233",
            ASCII_CONVERTER_PATH: "/opt/bin/converter",
            MAGICK_PATH: "",
            CONVERTER_TIMEOUT_MS: "30000",
            STRICT_GRID: "yes",
            ANTIALIAS: "off",
            LOG_LEVEL: "debug",
        });

        expect(job.settings.fontPath).toBe("/fonts/mono.ttf");
        expect(job.settings.fontSize).toBe(16);
        expect(job.settings.palette.foreground.toHex()).toBe("#00ff00");
        expect(job.settings.palette.background.toHex()).toBe("#112233");
        expect(job.settings.strictGrid).toBe(true);
        expect(job.settings.antialias).toBe(false);
        expect(tools).toEqual({ converterPath: "/opt/bin/converter", magickPath: null, timeout: 30000 });
        expect(logLevel).toBe("debug");
    });

    it("prefers command-line values over the environment", () => {
        const args = parseArguments(["-i", "a.png", "-r", "640x480", "-o", "b.png", "-s", "9", "-c", "abc", "-f", "x.otf"]);
        const { job } = buildConfig(args, { ASCII_RENDER_SIZE: "16", ASCII_RENDER_COLOR: "000", ASCII_RENDER_FONT: "y.ttf" });

        expect(job.dimensions.toString()).toBe("640x480");
        expect(job.settings.fontSize).toBe(9);
        expect(job.settings.palette.foreground.toHex()).toBe("#aabbcc");
        expect(job.settings.fontPath).toBe("x.otf");
    });

    it("requires input, output and one resolution", () => {
        expect(() => buildConfig(parseArguments(["-p", "4k", "-o", "o.png"]), {})).toThrow(
            new InvalidArgumentError("An input image (-i) is required."),
        );
        expect(() => buildConfig(parseArguments(["-i", "i.png", "-p", "4k"]), {})).toThrow(
            new InvalidArgumentError("An output path (-o) is required."),
        );
        expect(() => buildConfig(parseArguments(["-i", "i.png", "-o", "o.png"]), {})).toThrow(InvalidResolutionError);
        expect(() =>
            buildConfig(parseArguments(["-i", "i.png", "-o", "o.png", "-p", "4k", "-r", "10x10"]), {}),
        ).toThrow(InvalidResolutionError);
    });

    it("rejects malformed values", () => {
        expect(() => buildConfig(parseArguments(["-i", "i", "-o", "o", "-p", "4k", "-c", "red"]), {})).toThrow(
            InvalidColorError,
        );
        expect(() => buildConfig(parseArguments(["-i", "i", "-o", "o", "-p", "4k", "-s", "0"]), {})).toThrow(
            new InvalidArgumentError('Font size must be a positive integer (got "0").'),
        );
        expect(() => buildConfig(base, { STRICT_GRID: "sometimes" })).toThrow(
            new InvalidArgumentError('STRICT_GRID must be true or false (got "sometimes").'),
        );
        expect(() => buildConfig(base, { CONVERTER_TIMEOUT_MS: "-5" })).toThrow(InvalidArgumentError);
        expect(() => buildConfig(base, { LOG_LEVEL: "loud" })).toThrow(InvalidArgumentError);
    });
});

describe("run", () => {
    let dir: string;
    let input: string;
    let output: string;
    let env: NodeJS.ProcessEnv;
    let stdout: string[];
    let stderr: string[];
    let created: { tools: ToolSettings; canvas: Dimensions }[];

    function dependencies(convert: (grid: GridSize) => Promise<AsciiBlock>): RunDependencies {
        return {
            createLogger: () => silentLogger(),
            createSource: (tools, _logger, canvas): AsciiSource => {
                created.push({ tools, canvas });
                return { convert: async (_image, grid) => convert(grid) };
            },
        };
    }

    const filled = async (grid: GridSize): Promise<AsciiBlock> =>
        AsciiBlock.fromRows(new Array<string>(grid.rows).fill("A".repeat(grid.columns)));

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "cli-test-"));
        input = join(dir, "in.jpg");
        output = join(dir, "out.png");
        await writeFile(input, "image bytes");
        env = { ASCII_RENDER_FONT: await writeTestFont(dir), ASCII_RENDER_SIZE: "20" };
        stdout = [];
        stderr = [];
        created = [];
        vi.spyOn(console, "log").mockImplementation((line: string) => {
            stdout.push(line);
        });
        vi.spyOn(console, "error").mockImplementation((line: string) => {
            stderr.push(line);
        });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it("prints usage for --help", async () => {
        expect(await run(["--help"], env, dependencies(filled))).toBe(0);
        expect(stdout).toEqual([USAGE]);
    });

    it("renders the image and reports where it went", async () => {
        const code = await run(["-i", input, "-r", "100x60", "-o", output], env, dependencies(filled));

        expect(code).toBe(0);
        expect(stderr).toEqual([]);
        expect(stdout).toEqual([`Successfully saved at ${output}`]);
        expect(created).toHaveLength(1);
        expect(created[0].canvas.toString()).toBe("100x60");
        expect(created[0].tools.converterPath).toBe("ascii-image-converter");

        const png = decodePng(await readFile(output));
        expect([png.width, png.height]).toEqual([100, 60]);
    });

    it("reports an invalid color before converting", async () => {
        const code = await run(["-i", input, "-p", "720p", "-o", output, "-c", "zz"], env, dependencies(filled));

        expect(code).toBe(1);
        expect(stderr).toEqual(['Error [color]: Invalid color format: "zz". Expected RGB or RRGGBB hex digits.']);
        expect(created).toHaveLength(0);
        expect(stdout).toEqual([]);
    });

    it("reports a missing input image", async () => {
        const missing = join(dir, "missing.jpg");
        const code = await run(["-i", missing, "-p", "720p", "-o", output], env, dependencies(filled));

        expect(code).toBe(1);
        expect(stderr).toEqual([`Error [input]: Input image ${missing} not found.`]);
    });

    it("reports unexpected failures as internal", async () => {
        const code = await run(
            ["-i", input, "-p", "720p", "-o", output],
            env,
            dependencies(async () => {
                throw new Error("boom");
            }),
        );

        expect(code).toBe(1);
        expect(stderr).toEqual(["Error [internal]: boom"]);
    });
});
