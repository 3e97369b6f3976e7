/**
 * Screen - root surface that writes finished regions to a terminal.
 *
 * Each frame walks the dirty rectangle row by row: one cursor move per row,
 * then the cells, with SGR codes emitted only where a cell's attributes or
 * colors differ from the previously written cell.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Attr, type Cell, isPrintable } from "./cell.js";
import type { SurfaceResult } from "./errors.js";
import { type Point, Rect } from "./geometry.js";
import type { Compositor, RenderSink, Surface } from "./surface.js";
import type { Terminal } from "./terminal.js";

export interface ScreenOptions {
	/**
	 * Append a one-line summary of every frame to this file.
	 * Defaults to ~/.termsurf/debug.log when TERMSURF_DEBUG_RENDER=1, otherwise off.
	 */
	debugLogPath?: string;
}

interface ResizeWaiter {
	resolve: (bounds: Rect) => void;
	reject: (error: Error) => void;
}

export class Screen implements RenderSink {
	readonly terminal: Terminal;
	private readonly root: Surface;
	// Last written cell state; undefined forces a full reset on the next cell
	private current: Cell | undefined;
	private cursorShown = true;
	private resizeWaiters: ResizeWaiter[] = [];
	private readonly debugLogPath: string;
	private frameCount = 0;

	constructor(compositor: Compositor, terminal: Terminal, options: ScreenOptions = {}) {
		this.terminal = terminal;
		this.root = compositor.createSurface(terminal.columns, terminal.rows, { sink: this });
		this.debugLogPath =
			options.debugLogPath ??
			(process.env.TERMSURF_DEBUG_RENDER === "1" ? path.join(os.homedir(), ".termsurf", "debug.log") : "");
	}

	/** The root surface. Layers added here end up on the terminal. */
	get surface(): Surface {
		return this.root;
	}

	get width(): number {
		return this.root.width;
	}

	get height(): number {
		return this.root.height;
	}

	/** Number of frames written so far */
	get frames(): number {
		return this.frameCount;
	}

	get cursorVisible(): boolean {
		return this.cursorShown;
	}

	addLayer(child: Surface, z?: number): SurfaceResult;
	addLayer(child: Surface, pos: Point, z?: number): SurfaceResult;
	addLayer(child: Surface, posOrZ?: Point | number, z?: number): SurfaceResult {
		if (posOrZ === undefined || typeof posOrZ === "number") {
			return this.root.addLayer(child, posOrZ);
		}
		return this.root.addLayer(child, posOrZ, z);
	}

	removeLayer(child: Surface): SurfaceResult {
		return this.root.removeLayer(child);
	}

	moveLayer(child: Surface, z: number): SurfaceResult {
		return this.root.moveLayer(child, z);
	}

	containsLayer(child: Surface): boolean {
		return this.root.containsLayer(child);
	}

	renderDone(_surface: Surface, dirty: Rect): void {
		const region = Rect.intersect(this.root.bounds, dirty);
		if (!region.valid()) return;

		this.current = undefined;
		let buffer = "";
		for (let y = region.top.y; y < region.bottom.y; y++) {
			// Terminal coordinates start at 1
			buffer += `\x1b[${y + 1};${region.top.x + 1}H`;
			for (let x = region.top.x; x < region.bottom.x; x++) {
				buffer += this.drawCell(this.root.cellAt(x, y));
			}
		}

		// Write entire frame at once
		this.terminal.write(buffer);
		this.frameCount++;

		if (this.debugLogPath) {
			fs.mkdirSync(path.dirname(this.debugLogPath), { recursive: true });
			fs.appendFileSync(
				this.debugLogPath,
				`[${new Date().toISOString()}] frame ${this.frameCount}: dirty=(${region}) bytes=${buffer.length}\n`,
			);
		}
	}

	/** Redraw everything */
	refresh(): void {
		this.root.invalidate();
		this.root.render();
	}

	/** Reset attributes, clear the terminal and mark the whole screen dirty */
	clear(): void {
		this.terminal.write("\x1b[0m");
		this.terminal.clearScreen();
		this.current = undefined;
		this.root.invalidate();
	}

	/**
	 * Re-read the terminal size and resize the root surface. Content is
	 * discarded; call refresh() afterwards to repaint the layers.
	 */
	resize(): SurfaceResult {
		return this.root.resize(this.terminal.columns, this.terminal.rows);
	}

	/** Resolve with the new terminal bounds at the next resize notification */
	waitForResize(): Promise<Rect> {
		return new Promise((resolve, reject) => {
			this.resizeWaiters.push({ resolve, reject });
		});
	}

	/** Deliver a resize notification from the terminal */
	handleResize(): void {
		const bounds = Rect.fromSize(this.terminal.columns, this.terminal.rows);
		const waiters = this.resizeWaiters;
		this.resizeWaiters = [];
		for (const waiter of waiters) {
			waiter.resolve(bounds);
		}
	}

	showCursor(): void {
		this.terminal.showCursor();
		this.cursorShown = true;
	}

	hideCursor(): void {
		this.terminal.hideCursor();
		this.cursorShown = false;
	}

	/** Move the terminal cursor to a 0-based cell position */
	setCursorPos(pos: Point): void {
		this.terminal.write(`\x1b[${pos.y + 1};${pos.x + 1}H`);
	}

	/** Clear the terminal and give the cursor back. Pending resize waits are rejected. */
	close(): void {
		this.clear();
		this.showCursor();
		const waiters = this.resizeWaiters;
		this.resizeWaiters = [];
		for (const waiter of waiters) {
			waiter.reject(new Error("Screen closed"));
		}
	}

	private drawCell(ch: Cell): string {
		const prev = this.current;
		let out = "";
		let changed = false;

		if (!prev || ch.attr !== prev.attr) {
			// Attributes can only be dropped by a full reset
			out += "\x1b[0m";
			if (ch.attr & Attr.bold) out += "\x1b[1m";
			if (ch.attr & Attr.underscore) out += "\x1b[4m";
			if (ch.attr & Attr.blink) out += "\x1b[5m";
			if (ch.attr & Attr.reverse) out += "\x1b[7m";
			changed = true;
		}
		if (changed || ch.fg !== prev?.fg) {
			out += `\x1b[38;5;${ch.fg}m`;
			changed = true;
		}
		if (changed || ch.bg !== prev?.bg) {
			out += `\x1b[48;5;${ch.bg}m`;
			changed = true;
		}
		if (changed) this.current = ch;

		out += isPrintable(ch.ch) ? ch.ch : " ";
		return out;
	}
}
