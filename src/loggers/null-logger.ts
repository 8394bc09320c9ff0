import type { SensorDataLogger } from "./types";

/**
 * Used when no logfile is configured.
 */
export class NullSensorLogger implements SensorDataLogger {
	readonly type = "none";

	open(): void {}

	close(): void {}

	logSensorData(): void {}
}
