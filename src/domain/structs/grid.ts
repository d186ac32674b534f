//
//
//

/**
 * GridSize is the number of character cells of an ASCII block.
 */
export class GridSize {
    public constructor(
        public readonly columns: number,
        public readonly rows: number,
    ) {}

    public toString(): string {
        return `${this.columns}x${this.rows}`;
    }
}

/**
 * GlyphCell is the pixel footprint of one monospace character.
 */
export class GlyphCell {
    public constructor(
        public readonly width: number,
        public readonly height: number,
    ) {}
}
