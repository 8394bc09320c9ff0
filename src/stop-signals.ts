import type { TextOutput } from "./lib/heartbeat";

export const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const; // Ctrl+C, systemd stop

export type StopSignal = (typeof STOP_SIGNALS)[number];

/** Exit status for a process stopped by a second interrupt */
export const FORCED_EXIT_CODE = 130;

export interface StopHandlerHost {
	on(signal: StopSignal, listener: () => void): unknown;
	exit(code: number): void;
	stderr: TextOutput;
}

/**
 * The first stop signal aborts the controller so the event loop can clean up.
 * Any later one exits right away.
 */
export function installStopHandlers(controller: AbortController, host: StopHandlerHost): void {
	const stop = (signal: StopSignal): void => {
		if (controller.signal.aborted) {
			host.exit(FORCED_EXIT_CODE);
			return;
		}
		host.stderr.write(`\nStopping (signal=${signal})\n`);
		controller.abort();
	};

	for (const signal of STOP_SIGNALS) {
		host.on(signal, () => stop(signal));
	}
}
