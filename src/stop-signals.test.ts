import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";

import { installStopHandlers } from "./stop-signals";
import type { StopSignal } from "./stop-signals";

describe("installStopHandlers", () => {
	let listeners: Map<StopSignal, () => void>;
	let err: string[];
	let exit: Mock<[number], void>;
	let controller: AbortController;

	beforeEach(() => {
		listeners = new Map();
		err = [];
		exit = vi.fn<[number], void>();
		controller = new AbortController();

		installStopHandlers(controller, {
			on: (signal, listener) => listeners.set(signal, listener),
			exit,
			stderr: { write: (s: string) => err.push(s) }
		});
	});

	function send(signal: StopSignal): void {
		const listener = listeners.get(signal);
		if (!listener) throw new Error(`no listener for ${signal}`);
		listener();
	}

	it("listens for SIGINT and SIGTERM", () => {
		expect([...listeners.keys()]).toEqual(["SIGINT", "SIGTERM"]);
	});

	it("aborts on the first signal without exiting", () => {
		send("SIGINT");

		expect(controller.signal.aborted).toBe(true);
		expect(err).toEqual(["\nStopping (signal=SIGINT)\n"]);
		expect(exit).not.toHaveBeenCalled();
	});

	it("exits with 130 on a second signal", () => {
		send("SIGTERM");
		send("SIGINT");

		expect(exit).toHaveBeenCalledTimes(1);
		expect(exit).toHaveBeenCalledWith(130);
		expect(err).toEqual(["\nStopping (signal=SIGTERM)\n"]);
	});
});
