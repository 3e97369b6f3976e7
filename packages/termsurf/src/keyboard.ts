import { InputQueue } from "./input-queue.js";
import { Key, type Keymap, Modifier, XTERM_KEYMAP } from "./keys.js";

/**
 * Outcome of waiting for a key. Malformed escape input still yields a key
 * (Key.unknown or Key.escapeSequence); only the input itself failing is an
 * error.
 */
export type KeyReadResult = { type: "key"; code: number } | { type: "timeout" } | { type: "error"; error: Error };

export interface KeyboardOptions {
	/**
	 * How long to wait for the next byte of an escape sequence (default: 10ms).
	 * A lone ESC followed by silence this long is the Escape key.
	 */
	escapeTimeout?: number;
	/** Terminator table for CSI / SS3 sequences (default: xterm) */
	keymap?: Keymap;
}

const CR = 0x0d;
const SEMICOLON = 0x3b;
const CSI_INTRODUCER = 0x5b; // [
const SS3_INTRODUCER = 0x4f; // O
const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;

function key(code: number): KeyReadResult {
	return { type: "key", code };
}

/** Raw mode sends CR for Enter */
function classify(byte: number): number {
	return byte === CR ? Key.enter : byte;
}

/**
 * Pull-based key decoder over an InputQueue.
 *
 * Escape handling:
 * - `ESC` then nothing within escapeTimeout: Key.escape
 * - `ESC [` or `ESC O`: sequence, parameters `n;n;...` then a terminator
 *   looked up in the keymap
 * - `ESC` then any other byte: that key + Modifier.alt
 */
export class Keyboard {
	readonly input: InputQueue;
	private readonly escapeTimeoutMs: number;
	private readonly keymap: Keymap;
	// Tail of the decode chain; one key is decoded at a time
	private decoding: Promise<void> = Promise.resolve();

	constructor(input: InputQueue = new InputQueue(), options: KeyboardOptions = {}) {
		this.input = input;
		this.escapeTimeoutMs = options.escapeTimeout ?? 10;
		this.keymap = options.keymap ?? XTERM_KEYMAP;
	}

	/** Hand raw terminal input to the decoder */
	feed(data: Buffer | Uint8Array | string): void {
		this.input.push(data);
	}

	/** Fail pending and future waits, e.g. when the terminal is released */
	close(error?: Error): void {
		this.input.close(error);
	}

	/**
	 * Wait for the next key. Concurrent calls are served in call order, each
	 * decoding a whole key before the next one starts reading.
	 * @param timeoutMs - how long to wait for the first byte once this call's
	 * turn comes; negative waits forever
	 */
	waitForKey(timeoutMs = -1): Promise<KeyReadResult> {
		const result = this.decoding.then(() => this.decode(timeoutMs));
		// The caller gets the outcome; the chain only needs to know it settled
		this.decoding = result.then(
			() => undefined,
			() => undefined,
		);
		return result;
	}

	private async decode(timeoutMs: number): Promise<KeyReadResult> {
		const first = await this.input.read(timeoutMs);
		if (first.type !== "byte") return first;
		if (first.byte !== Key.escape) return key(classify(first.byte));

		const next = await this.input.read(this.escapeTimeoutMs);
		if (next.type === "timeout") return key(Key.escape);
		if (next.type === "error") return next;

		if (next.byte === CSI_INTRODUCER || next.byte === SS3_INTRODUCER) {
			return this.parseSequence();
		}
		// Most terminals send Alt+key as ESC key
		return key(classify(next.byte) + Modifier.alt);
	}

	private async parseSequence(): Promise<KeyReadResult> {
		const params: number[] = [];
		let current = 0;
		let digits = false;

		while (true) {
			const next = await this.input.read(this.escapeTimeoutMs);
			if (next.type === "timeout") return key(Key.escapeSequence);
			if (next.type === "error") return next;

			const byte = next.byte;
			if (byte >= DIGIT_0 && byte <= DIGIT_9) {
				current = current * 10 + (byte - DIGIT_0);
				digits = true;
			} else if (byte === SEMICOLON) {
				params.push(current);
				current = 0;
				digits = false;
			} else {
				if (digits) params.push(current);
				const resolve = this.keymap.map.get(String.fromCharCode(byte));
				return key(resolve ? resolve(params) : Key.unknown);
			}
		}
	}
}
