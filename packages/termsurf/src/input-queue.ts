/**
 * InputQueue buffers raw input bytes for pull-based readers.
 *
 * Terminal data events arrive in chunks of arbitrary size; an escape
 * sequence like `\x1b[5;3~` may be split across several of them. The queue
 * keeps every byte in arrival order and lets a reader wait for the next one
 * with a timeout, which is what the keyboard decoder needs to tell a lone
 * Escape key apart from the start of a sequence.
 */

export type ReadResult = { type: "byte"; byte: number } | { type: "timeout" } | { type: "error"; error: Error };

interface PendingRead {
	resolve: (result: ReadResult) => void;
	timer: ReturnType<typeof setTimeout> | null;
}

export class InputQueue {
	private bytes: number[] = [];
	private head = 0;
	private readonly pending: PendingRead[] = [];
	private closedWith: Error | null = null;

	/** Append input. Strings are encoded as UTF-8. */
	push(data: Buffer | Uint8Array | string): void {
		if (this.closedWith) return;
		const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : data;
		for (const byte of chunk) {
			this.bytes.push(byte);
		}
		this.drain();
	}

	/** Number of bytes waiting to be read */
	get available(): number {
		return this.bytes.length - this.head;
	}

	get closed(): boolean {
		return this.closedWith !== null;
	}

	/**
	 * Wait for the next byte.
	 * @param timeoutMs - negative waits forever, 0 only takes what is already buffered
	 */
	read(timeoutMs = -1): Promise<ReadResult> {
		const byte = this.take();
		if (byte !== undefined) {
			return Promise.resolve({ type: "byte", byte });
		}
		if (this.closedWith) {
			return Promise.resolve({ type: "error", error: this.closedWith });
		}
		if (timeoutMs === 0) {
			return Promise.resolve({ type: "timeout" });
		}

		return new Promise((resolve) => {
			const entry: PendingRead = { resolve, timer: null };
			if (timeoutMs > 0) {
				entry.timer = setTimeout(() => {
					const index = this.pending.indexOf(entry);
					if (index !== -1) this.pending.splice(index, 1);
					resolve({ type: "timeout" });
				}, timeoutMs);
			}
			this.pending.push(entry);
		});
	}

	/** Drop buffered bytes. Pending reads keep waiting. */
	clear(): void {
		this.bytes = [];
		this.head = 0;
	}

	/**
	 * Fail all pending and future reads with error. Buffered bytes are
	 * discarded.
	 */
	close(error: Error = new Error("Input closed")): void {
		if (this.closedWith) return;
		this.closedWith = error;
		this.clear();
		for (const entry of this.pending.splice(0)) {
			if (entry.timer) clearTimeout(entry.timer);
			entry.resolve({ type: "error", error });
		}
	}

	private take(): number | undefined {
		if (this.head >= this.bytes.length) return undefined;
		const byte = this.bytes[this.head++];
		if (this.head === this.bytes.length) {
			this.bytes = [];
			this.head = 0;
		}
		return byte;
	}

	private drain(): void {
		while (this.pending.length > 0) {
			const byte = this.take();
			if (byte === undefined) return;
			const entry = this.pending.shift();
			if (!entry) return;
			if (entry.timer) clearTimeout(entry.timer);
			entry.resolve({ type: "byte", byte });
		}
	}
}
