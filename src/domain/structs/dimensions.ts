//
//
//

/**
 * Pixel size of the target canvas.
 */
export class Dimensions {
    private constructor(
        public readonly width: number,
        public readonly height: number,
    ) {}

    /**
     * Creates new dimensions. Both sides must be positive integers.
     */
    public static new(width: number, height: number): Dimensions | null {
        if (!Number.isSafeInteger(width) || !Number.isSafeInteger(height)) {
            return null;
        }
        if (width <= 0 || height <= 0) {
            return null;
        }

        return new Dimensions(width, height);
    }

    public toString(): string {
        return `${this.width}x${this.height}`;
    }
}
