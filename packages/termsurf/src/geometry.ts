/**
 * Point and rectangle arithmetic for cell coordinates.
 */

export interface Point {
	readonly x: number;
	readonly y: number;
}

export function point(x = 0, y = 0): Point {
	return { x, y };
}

export function pointToString(p: Point): string {
	return `${p.x}, ${p.y}`;
}

/**
 * Half-open rectangle [top, bottom).
 *
 * A rectangle whose bottom is not past its top on both axes is invalid and
 * behaves as empty: zero width, height and size.
 */
export class Rect {
	static readonly EMPTY = new Rect(point(), point());

	readonly top: Point;
	readonly bottom: Point;

	constructor(top: Point, bottom: Point) {
		this.top = top;
		this.bottom = bottom;
	}

	static of(tx: number, ty: number, bx: number, by: number): Rect {
		return new Rect(point(tx, ty), point(bx, by));
	}

	/** Rectangle at the origin with the given size */
	static fromSize(width: number, height: number): Rect {
		return Rect.of(0, 0, width, height);
	}

	/** Overlapping area of r1 and r2. May be invalid when they don't overlap. */
	static intersect(r1: Rect, r2: Rect): Rect {
		return Rect.of(
			Math.max(r1.top.x, r2.top.x),
			Math.max(r1.top.y, r2.top.y),
			Math.min(r1.bottom.x, r2.bottom.x),
			Math.min(r1.bottom.y, r2.bottom.y),
		);
	}

	/**
	 * Smallest rectangle enclosing both r1 and r2.
	 * An invalid operand contributes nothing.
	 */
	static boundingRect(r1: Rect, r2: Rect): Rect {
		if (!r1.valid()) return r2.valid() ? r2 : Rect.EMPTY;
		if (!r2.valid()) return r1;
		return Rect.of(
			Math.min(r1.top.x, r2.top.x),
			Math.min(r1.top.y, r2.top.y),
			Math.max(r1.bottom.x, r2.bottom.x),
			Math.max(r1.bottom.y, r2.bottom.y),
		);
	}

	get width(): number {
		return this.valid() ? this.bottom.x - this.top.x : 0;
	}

	get height(): number {
		return this.valid() ? this.bottom.y - this.top.y : 0;
	}

	get size(): number {
		return this.width * this.height;
	}

	valid(): boolean {
		return this.bottom.x > this.top.x && this.bottom.y > this.top.y;
	}

	/** Same size, top corner placed at pos */
	moveTo(pos: Point): Rect {
		return new Rect(pos, point(pos.x + this.width, pos.y + this.height));
	}

	translate(dx: number, dy: number): Rect {
		return Rect.of(this.top.x + dx, this.top.y + dy, this.bottom.x + dx, this.bottom.y + dy);
	}

	/** Row-major linear offset of p. No bounds checking. */
	indexFor(p: Point): number {
		return (p.y - this.top.y) * this.width + (p.x - this.top.x);
	}

	/** Inverse of indexFor. No bounds checking. */
	pointFor(index: number): Point {
		const w = this.width;
		if (w === 0) return this.top;
		return point(this.top.x + (index % w), this.top.y + Math.floor(index / w));
	}

	containsPoint(p: Point): boolean {
		return p.x >= this.top.x && p.x < this.bottom.x && p.y >= this.top.y && p.y < this.bottom.y;
	}

	/** True if other lies entirely inside this rectangle. Invalid rects are contained everywhere. */
	contains(other: Rect): boolean {
		if (!other.valid()) return true;
		if (!this.valid()) return false;
		return (
			other.top.x >= this.top.x &&
			other.top.y >= this.top.y &&
			other.bottom.x <= this.bottom.x &&
			other.bottom.y <= this.bottom.y
		);
	}

	equals(other: Rect): boolean {
		return (
			this.top.x === other.top.x &&
			this.top.y === other.top.y &&
			this.bottom.x === other.bottom.x &&
			this.bottom.y === other.bottom.y
		);
	}

	toString(): string {
		return `${pointToString(this.top)}, ${pointToString(this.bottom)}`;
	}
}
