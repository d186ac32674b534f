//
//
//

import { InvalidColorError } from "../errors";

const HEX_COLOR = /^(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

// ---------------------------------------------------------------------------
// Color
// ---------------------------------------------------------------------------

export class Color {
    private constructor(
        public readonly red: number,
        public readonly green: number,
        public readonly blue: number,
    ) {}

    public static new(red: number, green: number, blue: number): Color {
        for (const channel of [red, green, blue]) {
            if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
                throw new RangeError(`Color channel out of range: ${channel}`);
            }
        }

        return new Color(red, green, blue);
    }

    /**
     * Parses an RGB or RRGGBB hex string. A leading "#" is ignored.
     * @throws InvalidColorError if the string has any other shape.
     */
    public static fromHex(value: string): Color {
        let hex = value.trim();
        if (hex.startsWith("#")) {
            hex = hex.slice(1);
        }
        if (!HEX_COLOR.test(hex)) {
            throw new InvalidColorError(value);
        }
        if (hex.length === 3) {
            hex = hex
                .split("")
                .map((digit) => digit + digit)
                .join("");
        }

        return Color.new(
            parseInt(hex.slice(0, 2), 16),
            parseInt(hex.slice(2, 4), 16),
            parseInt(hex.slice(4, 6), 16),
        );
    }

    public toHex(): string {
        const channels = [this.red, this.green, this.blue];
        return `#${channels.map((c) => c.toString(16).padStart(2, "0")).join("")}`;
    }
}

// ---------------------------------------------------------------------------
// Palette
// ---------------------------------------------------------------------------

export interface Palette {
    readonly foreground: Color;

    readonly background: Color;
}

export namespace Palette {
    export function fromHex(foreground: string, background: string): Palette {
        return {
            foreground: Color.fromHex(foreground),
            background: Color.fromHex(background),
        };
    }
}
