/**
 * Anything text can be written to; process.stdout in production.
 */
export interface TextOutput {
	write(text: string): unknown;
}

const HEARTBEAT_CHARS = ["-", "\\", "|", "/"] as const;

const BACKSPACE = "\b";

/**
 * Prints a rotating character to the terminal on demand, erasing the previous
 * one first.
 */
export class Heartbeat {
	private currentChar = 0;
	private flushOutput = false;

	constructor(private readonly output: TextOutput) {}

	printOutput(): void {
		this.erase();
		this.output.write(this.nextChar());
	}

	/**
	 * Forget the last printed character. Call after something else has written
	 * over it, so the next print does not erase foreign output.
	 */
	dontFlush(): void {
		this.flushOutput = false;
	}

	cleanUp(): void {
		this.output.write(BACKSPACE.repeat(3));
		this.flushOutput = false;
	}

	erase(): void {
		if (this.flushOutput) {
			this.output.write(BACKSPACE);
		} else {
			this.flushOutput = true;
		}
	}

	private nextChar(): string {
		const char = HEARTBEAT_CHARS[this.currentChar];
		this.currentChar = (this.currentChar + 1) % HEARTBEAT_CHARS.length;
		return char;
	}
}
