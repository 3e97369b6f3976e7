import { InputQueue } from "./input-queue.js";
import { Keyboard, type KeyboardOptions } from "./keyboard.js";
import { Screen, type ScreenOptions } from "./screen.js";
import { Compositor } from "./surface.js";
import { ProcessTerminal, type Terminal } from "./terminal.js";

export interface SessionOptions {
	screen?: ScreenOptions;
	keyboard?: KeyboardOptions;
}

type SessionState = "idle" | "open" | "closed";

/**
 * Everything an application needs for one terminal: the surface arena, the
 * screen that paints it, and the keyboard that reads it. Construct one in
 * the entry point and pass it (or its parts) to whoever needs them.
 *
 * A session is single use: once closed it cannot be opened again.
 */
export class TerminalSession {
	readonly terminal: Terminal;
	readonly compositor: Compositor;
	readonly screen: Screen;
	readonly keyboard: Keyboard;
	private state: SessionState = "idle";

	constructor(terminal: Terminal = new ProcessTerminal(), options: SessionOptions = {}) {
		this.terminal = terminal;
		this.compositor = new Compositor();
		this.screen = new Screen(this.compositor, terminal, options.screen);
		this.keyboard = new Keyboard(new InputQueue(), options.keyboard);
	}

	get isOpen(): boolean {
		return this.state === "open";
	}

	/** Enter raw mode, route input and resize events, hide the cursor and clear */
	open(): void {
		if (this.state !== "idle") {
			throw new Error(`Cannot open a session that is ${this.state}`);
		}
		this.terminal.start(
			(data) => this.keyboard.feed(data),
			() => this.screen.handleResize(),
		);
		this.state = "open";
		this.screen.hideCursor();
		this.screen.clear();
	}

	/**
	 * Restore the terminal. The terminal is stopped even if clearing the
	 * screen fails; pending key reads resolve with an error.
	 */
	close(): void {
		if (this.state !== "open") return;
		this.state = "closed";
		try {
			this.screen.close();
		} finally {
			this.keyboard.close(new Error("Session closed"));
			this.terminal.stop();
		}
	}

	/** Open, run fn, and close no matter how fn ends */
	async run<T>(fn: (session: TerminalSession) => Promise<T> | T): Promise<T> {
		this.open();
		try {
			return await fn(this);
		} finally {
			this.close();
		}
	}
}
