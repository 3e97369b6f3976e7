// Core compositor interfaces and classes

// Cells
export { Attr, BLANK_CELL, type Cell, Color, cell, cellsEqual, isPrintable, isTransparent } from "./cell.js";
export { CellBuffer, MAX_CELLS } from "./cell-buffer.js";
// Errors
export { fail, OK, SurfaceError, type SurfaceErrorCode, type SurfaceResult } from "./errors.js";
// Geometry
export { type Point, point, pointToString, Rect } from "./geometry.js";
// Input buffering for timed reads
export { InputQueue, type ReadResult } from "./input-queue.js";
// Keyboard input handling
export { Keyboard, type KeyboardOptions, type KeyReadResult } from "./keyboard.js";
export {
	formatKey,
	Key,
	type KeyId,
	type Keymap,
	type KeyResolver,
	Modifier,
	matchesKey,
	parseKeyId,
	splitKey,
	XTERM_KEYMAP,
} from "./keys.js";
// Screen output
export { Screen, type ScreenOptions } from "./screen.js";
// Session wiring
export { type SessionOptions, TerminalSession } from "./session.js";
// Surfaces
export {
	type CellStyle,
	Compositor,
	type RenderSink,
	Surface,
	type SurfaceId,
	type SurfaceOptions,
} from "./surface.js";
// Terminal interface and implementations
export { ProcessTerminal, type Terminal } from "./terminal.js";
