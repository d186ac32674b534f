//
//
//

import { GridSize } from "./grid";

/**
 * Result of fitting a block to a grid.
 */
export interface FitReport {
    readonly block: AsciiBlock;

    /**
     * Whether any row had to be trimmed, padded, dropped or added.
     */
    readonly reshaped: boolean;
}

/**
 * AsciiBlock is a rectangular grid of characters. Each character is a single
 * code point, so a Braille cell counts as one column.
 */
export class AsciiBlock {
    private readonly _rows: readonly (readonly string[])[];

    private constructor(rows: string[][]) {
        this._rows = rows;
    }

    /**
     * Splits converter output into rows. Trailing newlines are dropped and
     * CRLF line endings are accepted.
     */
    public static fromText(text: string): AsciiBlock {
        const trimmed = text.replace(/(?:\r?\n)+$/, "");
        if (trimmed.length === 0) {
            return new AsciiBlock([]);
        }

        return new AsciiBlock(trimmed.split(/\r?\n/).map((line) => Array.from(line)));
    }

    public static fromRows(rows: string[]): AsciiBlock {
        return new AsciiBlock(rows.map((line) => Array.from(line)));
    }

    public get rowCount(): number {
        return this._rows.length;
    }

    /**
     * Length of the longest row.
     */
    public get columnCount(): number {
        return this._rows.reduce((max, row) => Math.max(max, row.length), 0);
    }

    public get isEmpty(): boolean {
        return this._rows.every((row) => row.length === 0);
    }

    public rows(): IterableIterator<readonly string[]> {
        return this._rows.values();
    }

    public charAt(row: number, column: number): string | undefined {
        return this._rows[row]?.[column];
    }

    /**
     * Whether the block has exactly the rows and columns of the grid.
     */
    public matches(grid: GridSize): boolean {
        return this._rows.length === grid.rows && this._rows.every((row) => row.length === grid.columns);
    }

    /**
     * Trims or pads the block to the grid. Long rows are cut, short rows are
     * padded with spaces, extra rows are dropped and missing rows are blank.
     */
    public fit(grid: GridSize): FitReport {
        if (this.matches(grid)) {
            return { block: this, reshaped: false };
        }

        const rows: string[][] = [];
        for (let r = 0; r < grid.rows; r += 1) {
            const row = this._rows[r] ?? [];
            const fitted = row.slice(0, grid.columns);
            while (fitted.length < grid.columns) {
                fitted.push(" ");
            }
            rows.push(fitted);
        }

        return { block: new AsciiBlock(rows), reshaped: true };
    }

    public toString(): string {
        return this._rows.map((row) => row.join("")).join("\n");
    }
}
