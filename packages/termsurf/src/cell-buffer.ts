import { BLANK_CELL, type Cell } from "./cell.js";
import { SurfaceError } from "./errors.js";

/** Upper bound on cells per buffer (4096 x 4096) */
export const MAX_CELLS = 1 << 24;

/**
 * Row-major cell storage whose length always equals width * height.
 */
export class CellBuffer {
	private cells: Cell[];
	private _width: number;
	private _height: number;

	/**
	 * @throws SurfaceError with code "allocation-failure" if storage for
	 * width * height cells cannot be obtained
	 */
	constructor(width: number, height: number) {
		this.cells = CellBuffer.allocate(width, height);
		this._width = width;
		this._height = height;
	}

	get width(): number {
		return this._width;
	}

	get height(): number {
		return this._height;
	}

	get length(): number {
		return this.cells.length;
	}

	get(index: number): Cell {
		return this.cells[index] ?? BLANK_CELL;
	}

	set(index: number, cell: Cell): void {
		if (index < 0 || index >= this.cells.length) return;
		this.cells[index] = cell;
	}

	fill(cell: Cell, start = 0, end = this.cells.length): void {
		this.cells.fill(cell, start, end);
	}

	/**
	 * Replace storage with a blank width * height buffer. On failure the old
	 * contents and size are kept.
	 */
	resize(width: number, height: number): void {
		const cells = CellBuffer.allocate(width, height);
		if (cells.length !== width * height) {
			throw new SurfaceError("allocation-failure", `Cell buffer holds ${cells.length} cells, expected ${width}x${height}`);
		}
		this.cells = cells;
		this._width = width;
		this._height = height;
	}

	/** Copy of one row, mostly for tests and debugging */
	row(y: number): Cell[] {
		return this.cells.slice(y * this._width, (y + 1) * this._width);
	}

	private static allocate(width: number, height: number): Cell[] {
		if (width * height > MAX_CELLS) {
			throw new SurfaceError("allocation-failure", `Cannot allocate ${width}x${height} cells (limit ${MAX_CELLS})`);
		}
		try {
			return new Array<Cell>(width * height).fill(BLANK_CELL);
		} catch (error) {
			if (error instanceof RangeError) {
				throw new SurfaceError("allocation-failure", `Cannot allocate ${width}x${height} cells: ${error.message}`);
			}
			throw error;
		}
	}
}
