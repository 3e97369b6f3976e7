/**
 * Key codes, modifier offsets and escape-sequence keymaps.
 *
 * A decoded key is a single number: a plain input byte, or one of the named
 * codes in `Key`, plus an optional multiple of `Modifier.meta`. Sequences
 * such as `\x1b[5;3~` carry the multiplier as their last parameter, and
 * `\x1b` followed by any other byte adds `Modifier.alt`.
 *
 * API:
 * - Key, Modifier - code constants
 * - XTERM_KEYMAP - terminator table for CSI / SS3 sequences
 * - formatKey(code) - readable name such as "shift+up"
 * - parseKeyId(id) - inverse of formatKey
 * - matchesKey(code, keyId) - compare a decoded code with a name
 */

// =============================================================================
// Constants
// =============================================================================

export const Key = {
	unknown: 0,
	tab: 9,
	enter: 10,
	escape: 27,
	backspace: 127,
	f1: 10000,
	f2: 10001,
	f3: 10002,
	f4: 10003,
	f5: 10004,
	f6: 10005,
	f7: 10006,
	f8: 10007,
	f9: 10008,
	f10: 10009,
	f11: 10010,
	f12: 10011,
	insert: 10012,
	delete: 10013,
	home: 10014,
	end: 10015,
	pageUp: 10016,
	pageDown: 10017,
	up: 10018,
	down: 10019,
	left: 10020,
	right: 10021,
	/** Escape sequence that was cut off before its terminator arrived */
	escapeSequence: 10022,
} as const;

/**
 * Modifier offsets. Each is a multiple of `meta`, matching the xterm
 * modifier parameter (2 = shift, 3 = alt, 5 = ctrl, ...).
 */
export const Modifier = {
	meta: 1000,
	shift: 2000,
	alt: 3000,
	shiftAlt: 4000,
	ctrl: 5000,
	shiftCtrl: 6000,
	altCtrl: 7000,
	shiftAltCtrl: 8000,
} as const;

const MAX_MODIFIER_STEP = 8;

// =============================================================================
// Keymaps
// =============================================================================

/** Maps the parameter list of a sequence to a key code */
export type KeyResolver = (params: readonly number[]) => number;

/** Terminator byte (as a one-character string) to resolver, for one terminal family */
export interface Keymap {
	readonly name: string;
	readonly map: ReadonlyMap<string, KeyResolver>;
}

function isModifierStep(n: number | undefined): n is number {
	return n !== undefined && n >= 1 && n <= MAX_MODIFIER_STEP;
}

/** Plain key without parameters, modified key when the last parameter is a modifier step */
function withModifier(key: number): KeyResolver {
	return (params) => {
		if (params.length === 0) return key;
		const last = params[params.length - 1];
		return isModifierStep(last) ? key + last * Modifier.meta : Key.unknown;
	};
}

const TILDE_KEYS = new Map<number, number>([
	[2, Key.insert],
	[3, Key.delete],
	[5, Key.pageUp],
	[6, Key.pageDown],
	[15, Key.f5],
	[17, Key.f6],
	[18, Key.f7],
	[19, Key.f8],
	[20, Key.f9],
	[21, Key.f10],
	[23, Key.f11],
	[24, Key.f12],
]);

// \x1b[<num>~ or \x1b[<num>;<mod>~
const resolveTilde: KeyResolver = (params) => {
	if (params.length === 0 || params.length > 2) return Key.unknown;
	const key = TILDE_KEYS.get(params[0]);
	if (key === undefined) return Key.unknown;
	const mod = params[1];
	return isModifierStep(mod) ? key + mod * Modifier.meta : key;
};

export const XTERM_KEYMAP: Keymap = {
	name: "xterm",
	map: new Map<string, KeyResolver>([
		["~", resolveTilde],
		["A", withModifier(Key.up)],
		["B", withModifier(Key.down)],
		["C", withModifier(Key.right)],
		["D", withModifier(Key.left)],
		["H", withModifier(Key.home)],
		["F", withModifier(Key.end)],
		["P", withModifier(Key.f1)],
		["Q", withModifier(Key.f2)],
		["R", withModifier(Key.f3)],
		["S", withModifier(Key.f4)],
	]),
};

// =============================================================================
// Key names
// =============================================================================

type SpecialKey =
	| "unknown"
	| "tab"
	| "enter"
	| "escape"
	| "backspace"
	| "space"
	| "f1"
	| "f2"
	| "f3"
	| "f4"
	| "f5"
	| "f6"
	| "f7"
	| "f8"
	| "f9"
	| "f10"
	| "f11"
	| "f12"
	| "insert"
	| "delete"
	| "home"
	| "end"
	| "pageUp"
	| "pageDown"
	| "up"
	| "down"
	| "left"
	| "right"
	| "escapeSequence";

type Letter =
	| "a"
	| "b"
	| "c"
	| "d"
	| "e"
	| "f"
	| "g"
	| "h"
	| "i"
	| "j"
	| "k"
	| "l"
	| "m"
	| "n"
	| "o"
	| "p"
	| "q"
	| "r"
	| "s"
	| "t"
	| "u"
	| "v"
	| "w"
	| "x"
	| "y"
	| "z";

type ModifierName = "meta" | "shift" | "alt" | "shift+alt" | "ctrl" | "shift+ctrl" | "alt+ctrl" | "shift+alt+ctrl";

type BaseKey = SpecialKey | Letter;

/**
 * Key identifiers with autocomplete, e.g. "pageUp", "shift+up", "alt+x".
 */
export type KeyId = BaseKey | `${ModifierName}+${BaseKey}`;

// Index is the modifier step
const MODIFIER_NAMES: readonly string[] = [
	"",
	"meta",
	"shift",
	"alt",
	"shift+alt",
	"ctrl",
	"shift+ctrl",
	"alt+ctrl",
	"shift+alt+ctrl",
];

const SPACE = 0x20;

const KEY_NAMES = new Map<number, string>(Object.entries(Key).map(([name, code]): [number, string] => [code, name]));
const NAMED_KEYS = new Map<string, number>(Object.entries(Key));

/**
 * Split a code into its base key and modifier step (0 when unmodified).
 * Named keys start at Key.f1; anything below is a byte plus modifier.
 */
export function splitKey(code: number): { key: number; step: number } {
	const origin = code >= Key.f1 ? Key.f1 : 0;
	const offset = code - origin;
	return { key: origin + (offset % Modifier.meta), step: Math.floor(offset / Modifier.meta) };
}

function baseName(key: number): string | undefined {
	const named = KEY_NAMES.get(key);
	if (named !== undefined) return named;
	if (key === SPACE) return "space";
	if (key > SPACE && key < 0x7f) return String.fromCharCode(key);
	if (key >= 0 && key < 0x100) return `0x${key.toString(16).padStart(2, "0")}`;
	return undefined;
}

/**
 * Readable name for a decoded key code, or undefined for negative codes and
 * codes outside the known ranges.
 */
export function formatKey(code: number): string | undefined {
	if (!Number.isInteger(code) || code < 0) return undefined;
	const { key, step } = splitKey(code);
	if (step > MAX_MODIFIER_STEP) return undefined;
	const name = baseName(key);
	if (name === undefined) return undefined;
	return step === 0 ? name : `${MODIFIER_NAMES[step]}+${name}`;
}

function parseBaseName(name: string): number | undefined {
	const named = NAMED_KEYS.get(name);
	if (named !== undefined) return named;
	if (name === "space") return SPACE;
	if (name.length === 1) {
		const code = name.charCodeAt(0);
		return code > SPACE && code < 0x7f ? code : undefined;
	}
	if (/^0x[0-9a-f]{2}$/.test(name)) return parseInt(name.slice(2), 16);
	return undefined;
}

/**
 * Parse a key name produced by formatKey back into a code.
 */
export function parseKeyId(id: string): number | undefined {
	// "alt++" names the plus key itself
	const cut = id.length > 1 && id.endsWith("+") ? id.length - 2 : id.lastIndexOf("+");
	let step = 0;
	let base = id;
	if (cut > 0) {
		step = MODIFIER_NAMES.indexOf(id.slice(0, cut));
		if (step <= 0) return undefined;
		base = id.slice(cut + 1);
	}
	const key = parseBaseName(base);
	return key === undefined ? undefined : key + step * Modifier.meta;
}

/**
 * Match a decoded key code against a key identifier.
 */
export function matchesKey(code: number, keyId: KeyId): boolean {
	return parseKeyId(keyId) === code;
}
