import type winston from "winston";

import type { SensorBackend } from "./backends";
import type { SensorEventHandler } from "./sensor-event-handler";

export const DEFAULT_POLL_INTERVAL_MS = 500;

export interface SensorEventLoopOptions {
	signal: AbortSignal;
	intervalMs?: number;
	logger?: winston.Logger;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise(resolve => {
		if (signal.aborted) return resolve();

		const done = (): void => {
			clearTimeout(timer);
			signal.removeEventListener("abort", done);
			resolve();
		};

		const timer = setTimeout(done, ms);
		signal.addEventListener("abort", done, { once: true });
	});
}

/**
 * Poll the backend until the signal aborts: drain queued readings into the
 * handler, tick the handler, sleep. The handler's exit hook runs once on the
 * way out.
 */
export async function runSensorEventLoop(
	backend: SensorBackend,
	handler: SensorEventHandler,
	opts: SensorEventLoopOptions
): Promise<void> {
	const intervalMs = opts.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;

	backend.registerSensorEvent(reading => handler.handleSensorEvent(reading));
	opts.logger?.info("Sensor event loop starting (backend=%s intervalMs=%d)", backend.name, intervalMs);

	try {
		while (!opts.signal.aborted) {
			const drained = backend.processPendingCallbacks();
			if (drained > 0) {
				opts.logger?.debug("Processed %d sensor event(s)", drained);
			}
			handler.handleLoop();
			await sleep(intervalMs, opts.signal);
		}
	} finally {
		handler.handleExit();
		opts.logger?.info("Sensor event loop stopped");
	}
}
