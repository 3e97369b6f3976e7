import { eastAsianWidth } from "get-east-asian-width";

/** Character attributes, OR'ed together in Cell.attr */
export const Attr = {
	none: 0x00,
	bold: 0x01,
	underscore: 0x02,
	blink: 0x04,
	reverse: 0x08,
	transparent: 0x80,
} as const;

/** The first eight entries of the 256-color palette */
export const Color = {
	black: 0,
	red: 1,
	green: 2,
	yellow: 3,
	blue: 4,
	magenta: 5,
	cyan: 6,
	white: 7,
} as const;

/**
 * One character cell. Cells are immutable, so buffers may share instances.
 */
export interface Cell {
	readonly ch: string;
	/** Foreground palette index (0-255) */
	readonly fg: number;
	/** Background palette index (0-255) */
	readonly bg: number;
	readonly attr: number;
}

export function cell(ch = " ", fg: number = Color.white, bg: number = Color.black, attr: number = Attr.none): Cell {
	return { ch, fg, bg, attr };
}

export const BLANK_CELL: Cell = cell();

export function cellsEqual(a: Cell, b: Cell): boolean {
	return a.ch === b.ch && a.fg === b.fg && a.bg === b.bg && a.attr === b.attr;
}

export function isTransparent(c: Cell): boolean {
	return (c.attr & Attr.transparent) !== 0;
}

/**
 * Whether ch can be written to a single terminal column without disturbing
 * the layout: exactly one code point, not a control character, not wide.
 */
export function isPrintable(ch: string): boolean {
	const cp = ch.codePointAt(0);
	if (cp === undefined) return false;
	if (ch.length > (cp > 0xffff ? 2 : 1)) return false;
	if (cp < 0x20 || (cp >= 0x7f && cp < 0xa0)) return false;
	return eastAsianWidth(cp) === 1;
}
