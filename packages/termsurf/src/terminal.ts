import * as fs from "node:fs";
import koffi from "koffi";

/**
 * Minimal terminal interface for the screen and keyboard
 */
export interface Terminal {
	// Start the terminal in raw mode with input and resize handlers
	start(onInput: (data: Buffer) => void, onResize: () => void): void;

	// Stop the terminal and restore state
	stop(): void;

	// Write output to terminal
	write(data: string): void;

	// Get terminal dimensions
	get columns(): number;
	get rows(): number;

	// Cursor visibility
	hideCursor(): void;
	showCursor(): void;

	// Clear entire screen and move cursor to (1,1)
	clearScreen(): void;
}

/**
 * Real terminal using process.stdin/stdout
 */
export class ProcessTerminal implements Terminal {
	private wasRaw = false;
	private started = false;
	private inputHandler?: (data: Buffer) => void;
	private resizeHandler?: () => void;
	private writeLogPath = process.env.TERMSURF_WRITE_LOG || "";

	start(onInput: (data: Buffer) => void, onResize: () => void): void {
		if (this.started) {
			throw new Error("Terminal already started");
		}
		this.started = true;
		this.inputHandler = onInput;
		this.resizeHandler = onResize;

		// Save previous state and enable raw mode: no echo, no line buffering
		this.wasRaw = process.stdin.isRaw || false;
		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(true);
		}
		process.stdin.on("data", this.inputHandler);
		process.stdin.resume();

		process.stdout.on("resize", this.resizeHandler);

		// Must run AFTER setRawMode(true) since that resets console mode flags
		this.enableWindowsVTInput();
	}

	/**
	 * On Windows, add ENABLE_VIRTUAL_TERMINAL_INPUT (0x0200) to the stdin
	 * console handle so special keys arrive as the same VT escape sequences
	 * other platforms send.
	 */
	private enableWindowsVTInput(): void {
		if (process.platform !== "win32") return;
		try {
			const k32 = koffi.load("kernel32.dll");
			const GetStdHandle = k32.func("void* __stdcall GetStdHandle(int)");
			const GetConsoleMode = k32.func("bool __stdcall GetConsoleMode(void*, _Out_ uint32_t*)");
			const SetConsoleMode = k32.func("bool __stdcall SetConsoleMode(void*, uint32_t)");

			const STD_INPUT_HANDLE = -10;
			const ENABLE_VIRTUAL_TERMINAL_INPUT = 0x0200;
			const handle = GetStdHandle(STD_INPUT_HANDLE);
			const mode = new Uint32Array(1);
			GetConsoleMode(handle, mode);
			SetConsoleMode(handle, mode[0] | ENABLE_VIRTUAL_TERMINAL_INPUT);
		} catch (error) {
			// Special keys then arrive as console events only; plain bytes still work
			this.log(`VT input unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
		}
	}

	stop(): void {
		if (!this.started) return;
		this.started = false;

		if (this.inputHandler) {
			process.stdin.removeListener("data", this.inputHandler);
			this.inputHandler = undefined;
		}
		if (this.resizeHandler) {
			process.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = undefined;
		}

		// Pause stdin so buffered input is not re-interpreted once raw mode is off
		process.stdin.pause();

		// Restore raw mode state
		if (process.stdin.setRawMode) {
			process.stdin.setRawMode(this.wasRaw);
		}
	}

	write(data: string): void {
		process.stdout.write(data);
		this.log(data);
	}

	get columns(): number {
		return process.stdout.columns || 80;
	}

	get rows(): number {
		return process.stdout.rows || 24;
	}

	hideCursor(): void {
		this.write("\x1b[?25l");
	}

	showCursor(): void {
		this.write("\x1b[?25h");
	}

	clearScreen(): void {
		this.write("\x1b[2J\x1b[H"); // Clear screen and move to home (1,1)
	}

	private log(data: string): void {
		if (!this.writeLogPath) return;
		try {
			fs.appendFileSync(this.writeLogPath, data, { encoding: "utf8" });
		} catch {
			// Stop logging after the first failed append
			this.writeLogPath = "";
		}
	}
}
