/**
 * Surface compositing tree.
 *
 * Surfaces live in a Compositor arena and refer to each other by handle:
 * a parent keeps the ids of its children per Z bucket, a child keeps the id
 * of its parent. Rendering walks from the mutated surface up to the root,
 * blending dirty regions of visible children into each ancestor, and hands
 * the final region to the RenderSink of the surface it ends on.
 */

import { BLANK_CELL, type Cell, cell, isTransparent } from "./cell.js";
import { CellBuffer } from "./cell-buffer.js";
import { fail, OK, SurfaceError, type SurfaceResult } from "./errors.js";
import { type Point, point, Rect } from "./geometry.js";

export type SurfaceId = number;

/**
 * Receives the region of a surface that a render pass finished. Used by the
 * root of a tree to push pixels somewhere, e.g. Screen.
 */
export interface RenderSink {
	renderDone(surface: Surface, dirty: Rect): void;
}

export interface SurfaceOptions {
	/** Called at the end of every render pass that leaves this surface with a non-empty region */
	sink?: RenderSink;
}

/**
 * Arena owning every surface of a tree. Surfaces are created and destroyed
 * here; a surface must be detached and empty before it can be destroyed.
 */
export class Compositor {
	private readonly surfaces = new Map<SurfaceId, Surface>();
	private nextId = 1;

	/**
	 * @throws SurfaceError if width/height are not non-negative integers or
	 * the buffer cannot be allocated
	 */
	createSurface(width: number, height: number, options: SurfaceOptions = {}): Surface {
		if (!isDimension(width) || !isDimension(height)) {
			throw new SurfaceError("invalid-geometry", `Invalid surface size ${width}x${height}`);
		}
		const surface = new Surface(this, this.nextId++, width, height, options.sink);
		this.surfaces.set(surface.id, surface);
		return surface;
	}

	get(id: SurfaceId | undefined): Surface | undefined {
		return id === undefined ? undefined : this.surfaces.get(id);
	}

	has(surface: Surface): boolean {
		return this.surfaces.get(surface.id) === surface;
	}

	get count(): number {
		return this.surfaces.size;
	}

	/**
	 * Drop a surface from the arena. The handle is dead afterwards: every
	 * mutation on it fails with "invalid-attachment".
	 */
	destroy(surface: Surface): SurfaceResult {
		if (!this.has(surface)) {
			return fail("invalid-attachment", `Surface ${surface.id} is not live in this compositor`);
		}
		if (surface.parent) {
			return fail("invalid-attachment", `Surface ${surface.id} is still attached to surface ${surface.parent.id}`);
		}
		if (surface.layerCount > 0) {
			return fail("invalid-attachment", `Surface ${surface.id} still hosts ${surface.layerCount} layer(s)`);
		}
		this.surfaces.delete(surface.id);
		surface.release();
		return OK;
	}
}

function isDimension(n: number): boolean {
	return Number.isInteger(n) && n >= 0;
}

function isCellPosition(pos: Point): boolean {
	return Number.isInteger(pos.x) && Number.isInteger(pos.y);
}

/** Colors and attributes applied to every cell written by Surface.write() */
export type CellStyle = Pick<Cell, "fg" | "bg" | "attr">;

export class Surface {
	readonly id: SurfaceId;
	private readonly compositor: Compositor;
	private readonly sink: RenderSink | undefined;
	private readonly buffer: CellBuffer;
	private localBounds: Rect;
	private dirtyRect = Rect.EMPTY;
	private pos: Point = point();
	private isVisible = true;
	private parentId: SurfaceId | undefined;
	// Z -> child ids
	private readonly layers = new Map<number, Set<SurfaceId>>();
	private destroyed = false;

	/** @internal Use Compositor.createSurface() */
	constructor(compositor: Compositor, id: SurfaceId, width: number, height: number, sink?: RenderSink) {
		this.compositor = compositor;
		this.id = id;
		this.sink = sink;
		this.buffer = new CellBuffer(width, height);
		this.localBounds = Rect.fromSize(width, height);
	}

	get width(): number {
		return this.localBounds.width;
	}

	get height(): number {
		return this.localBounds.height;
	}

	get size(): number {
		return this.localBounds.size;
	}

	/** Local bounds, always at origin (0,0) */
	get bounds(): Rect {
		return this.localBounds;
	}

	/** Bounds placed at the surface position, i.e. the area occupied in the parent */
	get frame(): Rect {
		return this.localBounds.moveTo(this.pos);
	}

	get position(): Point {
		return this.pos;
	}

	get visible(): boolean {
		return this.isVisible;
	}

	/** Accumulated region not yet rendered. Invalid means clean. */
	get dirty(): Rect {
		return this.dirtyRect;
	}

	get parent(): Surface | undefined {
		return this.compositor.get(this.parentId);
	}

	get alive(): boolean {
		return !this.destroyed;
	}

	get layerCount(): number {
		let count = 0;
		for (const bucket of this.layers.values()) count += bucket.size;
		return count;
	}

	cellAt(x: number, y: number): Cell {
		if (!this.localBounds.containsPoint(point(x, y))) return BLANK_CELL;
		return this.buffer.get(this.localBounds.indexFor(point(x, y)));
	}

	/** Z keys in use, ascending */
	zOrder(): number[] {
		return [...this.layers.keys()].sort((a, b) => a - b);
	}

	/** Children in bucket z, in paint order */
	layersAt(z: number): Surface[] {
		const bucket = this.layers.get(z);
		if (!bucket) return [];
		return this.resolveBucket(bucket);
	}

	/** Z bucket holding child, undefined if child is not a layer of this surface */
	zOf(child: Surface): number | undefined {
		for (const [z, bucket] of this.layers) {
			if (bucket.has(child.id)) return z;
		}
		return undefined;
	}

	// ---------------------------------------------------------------------
	// Content
	// ---------------------------------------------------------------------

	/**
	 * Reallocate to width x height and clear. If attached, the area occupied
	 * before the resize is invalidated in the parent.
	 */
	resize(width: number, height: number): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		if (!isDimension(width) || !isDimension(height)) {
			return fail("invalid-geometry", `Invalid surface size ${width}x${height}`);
		}
		try {
			this.buffer.resize(width, height);
		} catch (error) {
			if (error instanceof SurfaceError) return { ok: false, error };
			throw error;
		}

		this.parent?.invalidate(this.frame);
		this.localBounds = Rect.fromSize(width, height);
		this.dirtyRect = Rect.EMPTY;
		return this.clear();
	}

	/**
	 * Write pattern into every cell of crop (clipped to bounds), or into the
	 * whole surface when crop is omitted or invalid.
	 */
	fill(pattern: Cell, crop: Rect = Rect.EMPTY): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		let region = this.localBounds;
		if (crop.valid()) {
			region = Rect.intersect(this.localBounds, crop);
			if (!region.valid()) {
				return fail("invalid-geometry", `Crop ${crop} does not overlap surface bounds ${this.localBounds}`);
			}
		}

		if (region.equals(this.localBounds)) {
			this.buffer.fill(pattern);
		} else {
			for (let y = region.top.y; y < region.bottom.y; y++) {
				const start = this.localBounds.indexFor(point(region.top.x, y));
				this.buffer.fill(pattern, start, start + region.width);
			}
		}

		this.invalidate(region);
		return OK;
	}

	clear(crop: Rect = Rect.EMPTY): SurfaceResult {
		return this.fill(BLANK_CELL, crop);
	}

	/** Put value at (x, y) and mark that cell dirty */
	setCell(x: number, y: number, value: Cell): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		const pos = point(x, y);
		if (!isCellPosition(pos) || !this.localBounds.containsPoint(pos)) {
			return fail("invalid-geometry", `Cell ${x}, ${y} is outside surface bounds ${this.localBounds}`);
		}
		const index = this.localBounds.indexFor(pos);
		this.buffer.set(index, value);
		this.invalidate(index, index + 1);
		return OK;
	}

	/**
	 * Write text left to right starting at pos, one code point per cell.
	 * Text past the right edge is dropped; it does not wrap.
	 */
	write(pos: Point, text: string, style: CellStyle = BLANK_CELL): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		if (!isCellPosition(pos) || !this.localBounds.containsPoint(pos)) {
			return fail("invalid-geometry", `Position ${pos.x}, ${pos.y} is outside surface bounds ${this.localBounds}`);
		}
		const chars = Array.from(text).slice(0, this.localBounds.bottom.x - pos.x);
		if (chars.length === 0) return OK;

		const start = this.localBounds.indexFor(pos);
		chars.forEach((ch, i) => {
			this.buffer.set(start + i, cell(ch, style.fg, style.bg, style.attr));
		});
		this.invalidate(start, start + chars.length);
		return OK;
	}

	/**
	 * Copy the srcCrop area of other onto this surface with its top corner at
	 * pos. Transparent source cells leave the destination untouched.
	 */
	blend(other: Surface, srcCrop: Rect, pos: Point): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		if (other.destroyed) return other.deadHandle();
		const src = Rect.intersect(other.localBounds, srcCrop);
		const dst = Rect.intersect(this.localBounds, src.moveTo(pos));
		if (!src.valid() || !dst.valid()) {
			return fail("invalid-geometry", `Nothing to blend from ${srcCrop} at ${pos.x}, ${pos.y}`);
		}

		// dst may be clipped on the top/left; map back to where it starts in src
		const srcX = src.top.x + (dst.top.x - pos.x);
		const srcY = src.top.y + (dst.top.y - pos.y);
		for (let y = 0; y < dst.height; y++) {
			for (let x = 0; x < dst.width; x++) {
				const ch = other.buffer.get(other.localBounds.indexFor(point(srcX + x, srcY + y)));
				if (!isTransparent(ch)) {
					this.buffer.set(this.localBounds.indexFor(point(dst.top.x + x, dst.top.y + y)), ch);
				}
			}
		}

		this.invalidate(dst);
		return OK;
	}

	// ---------------------------------------------------------------------
	// Placement and visibility
	// ---------------------------------------------------------------------

	/**
	 * Place this surface at pos in its parent, optionally changing its Z.
	 * Detached surfaces only record the position.
	 */
	move(pos: Point, z?: number): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		if (!isCellPosition(pos)) {
			return fail("invalid-geometry", `Invalid position ${pos.x}, ${pos.y}`);
		}
		const parent = this.parent;
		if (parent) {
			this.invalidate();
			parent.invalidate(this.frame);
			if (z !== undefined) {
				const result = parent.moveLayer(this, z);
				if (!result.ok) return result;
			}
		}
		this.pos = pos;
		return OK;
	}

	moveZ(z: number): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		const parent = this.parent;
		if (!parent) {
			return fail("invalid-attachment", `Surface ${this.id} has no parent to change Z in`);
		}
		this.invalidate();
		return parent.moveLayer(this, z);
	}

	show(): void {
		this.invalidate();
		this.isVisible = true;
	}

	hide(): void {
		this.invalidate();
		this.parent?.invalidate(this.frame);
		this.isVisible = false;
	}

	// ---------------------------------------------------------------------
	// Layers
	// ---------------------------------------------------------------------

	addLayer(child: Surface, z?: number): SurfaceResult;
	addLayer(child: Surface, pos: Point, z?: number): SurfaceResult;
	addLayer(child: Surface, posOrZ?: Point | number, z = 0): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		if (child.destroyed) return child.deadHandle();
		if (child.parentId !== undefined) {
			return fail("invalid-attachment", `Surface ${child.id} is already attached to surface ${child.parentId}`);
		}
		for (let s: Surface | undefined = this; s; s = s.parent) {
			if (s === child) {
				return fail("invalid-attachment", `Surface ${child.id} cannot be a layer of its own descendant`);
			}
		}

		if (typeof posOrZ === "object" && !isCellPosition(posOrZ)) {
			return fail("invalid-geometry", `Invalid position ${posOrZ.x}, ${posOrZ.y}`);
		}

		let layerZ = z;
		if (typeof posOrZ === "number") {
			layerZ = posOrZ;
		} else if (posOrZ) {
			child.pos = posOrZ;
		}

		this.insertLayer(child.id, layerZ);
		this.invalidate(child.frame);
		child.parentId = this.id;
		return OK;
	}

	removeLayer(child: Surface): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		if (child.parentId !== this.id || !this.takeLayer(child.id)) {
			return fail("invalid-attachment", `Surface ${child.id} is not a layer of surface ${this.id}`);
		}
		this.invalidate(child.frame);
		child.parentId = undefined;
		return OK;
	}

	moveLayer(child: Surface, z: number): SurfaceResult {
		if (this.destroyed) return this.deadHandle();
		if (child.parentId !== this.id || !this.takeLayer(child.id)) {
			return fail("invalid-attachment", `Surface ${child.id} is not a layer of surface ${this.id}`);
		}
		this.insertLayer(child.id, z);
		this.invalidate(child.frame);
		return OK;
	}

	containsLayer(child: Surface): boolean {
		for (const bucket of this.layers.values()) {
			if (bucket.has(child.id)) return true;
		}
		return false;
	}

	// ---------------------------------------------------------------------
	// Dirty tracking and rendering
	// ---------------------------------------------------------------------

	/** Mark the whole surface dirty */
	invalidate(): Rect;
	/** Grow the dirty region to enclose rect (clipped to bounds) */
	invalidate(rect: Rect): Rect;
	/**
	 * Mark the buffer index range [start, end) dirty. A range within one row
	 * is exact; a range spanning rows widens to whole rows.
	 */
	invalidate(start: number, end: number): Rect;
	invalidate(rectOrStart?: Rect | number, end?: number): Rect {
		if (this.destroyed) return Rect.EMPTY;
		if (rectOrStart === undefined) {
			this.dirtyRect = this.localBounds.valid() ? this.localBounds : Rect.EMPTY;
			return this.dirtyRect;
		}
		if (typeof rectOrStart === "number") {
			return this.invalidate(this.rangeToRect(rectOrStart, end ?? rectOrStart + 1));
		}
		this.dirtyRect = Rect.boundingRect(this.dirtyRect, Rect.intersect(this.localBounds, rectOrStart));
		return this.dirtyRect;
	}

	/**
	 * Composite dirty children into this surface, continue with the parent,
	 * then hand the finished region to the sink and mark this surface clean.
	 */
	render(): void {
		if (this.destroyed) return;
		const children = this.paintOrder();

		for (const child of children) {
			if (child.isVisible && child.dirtyRect.valid()) {
				this.invalidate(child.dirtyRect.translate(child.pos.x, child.pos.y));
			}
		}

		if (!this.dirtyRect.valid()) return;

		// Layers repaint what they cover; leaves keep caller-painted content
		if (this.layers.size > 0) {
			this.clear(this.dirtyRect);
		}

		for (const child of children) {
			if (!child.isVisible) continue;
			const region = Rect.intersect(this.dirtyRect, child.frame);
			if (region.valid()) {
				this.blend(child, region.translate(-child.pos.x, -child.pos.y), region.top);
			}
		}
		for (const child of children) {
			child.dirtyRect = Rect.EMPTY;
		}

		this.parent?.render();

		const dirty = this.dirtyRect;
		this.dirtyRect = Rect.EMPTY;
		if (dirty.valid()) {
			this.sink?.renderDone(this, dirty);
		}
	}

	/** Text dump of this surface and its layers */
	describe(indent = ""): string {
		let out = `${indent}Surface #${this.id} bounds: ${this.frame} dirty: ${this.dirtyRect} visible: ${this.isVisible}\n`;
		for (const z of this.zOrder()) {
			out += `${indent}Z = ${z}:\n`;
			for (const child of this.layersAt(z)) {
				out += child.describe(`${indent}  `);
			}
		}
		return out;
	}

	/** @internal Called by Compositor.destroy() */
	release(): void {
		this.destroyed = true;
		this.dirtyRect = Rect.EMPTY;
	}

	private rangeToRect(start: number, end: number): Rect {
		const from = Math.max(0, start);
		const to = Math.min(this.localBounds.size, end);
		if (to <= from) return Rect.EMPTY;

		const first = this.localBounds.pointFor(from);
		const last = this.localBounds.pointFor(to - 1);
		if (first.y === last.y) {
			return Rect.of(first.x, first.y, last.x + 1, last.y + 1);
		}
		return Rect.of(0, first.y, this.localBounds.width, last.y + 1);
	}

	/** Children ascending by Z, then by id within a bucket */
	private paintOrder(): Surface[] {
		const out: Surface[] = [];
		for (const z of this.zOrder()) {
			const bucket = this.layers.get(z);
			if (bucket) out.push(...this.resolveBucket(bucket));
		}
		return out;
	}

	private resolveBucket(bucket: Set<SurfaceId>): Surface[] {
		const out: Surface[] = [];
		for (const id of [...bucket].sort((a, b) => a - b)) {
			const child = this.compositor.get(id);
			if (child) out.push(child);
		}
		return out;
	}

	private insertLayer(id: SurfaceId, z: number): void {
		let bucket = this.layers.get(z);
		if (!bucket) {
			bucket = new Set();
			this.layers.set(z, bucket);
		}
		bucket.add(id);
	}

	/** Remove id from whichever bucket holds it, dropping the bucket when it empties */
	private takeLayer(id: SurfaceId): boolean {
		for (const [z, bucket] of this.layers) {
			if (bucket.delete(id)) {
				if (bucket.size === 0) this.layers.delete(z);
				return true;
			}
		}
		return false;
	}

	private deadHandle(): SurfaceResult {
		return fail("invalid-attachment", `Surface ${this.id} has been destroyed`);
	}
}
