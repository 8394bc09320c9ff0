import type { SensorReading } from "../lib/sensor-data";
import type { SensorEventCallback } from "./types";

/**
 * Holds readings delivered by the SDK until the poll loop drains them, so
 * callbacks only ever run from the loop.
 */
export class QueuedCallbackDispatcher {
	private readonly callbacks: SensorEventCallback[] = [];
	private queue: SensorReading[] = [];

	register(callback: SensorEventCallback): number {
		this.callbacks.push(callback);
		return this.callbacks.length;
	}

	enqueue(reading: SensorReading): void {
		this.queue.push(reading);
	}

	get pending(): number {
		return this.queue.length;
	}

	/**
	 * Deliver everything queued so far, in arrival order. Readings enqueued by a
	 * callback wait for the next drain.
	 */
	processPendingCallbacks(): number {
		const batch = this.queue;
		this.queue = [];

		for (const reading of batch) {
			for (const callback of this.callbacks) {
				callback(reading);
			}
		}

		return batch.length;
	}

	clear(): void {
		this.callbacks.length = 0;
		this.queue = [];
	}
}
