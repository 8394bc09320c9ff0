import type { SensorReading } from "../lib/sensor-data";

export type LogType = "CSV" | "SQLite";

/**
 * SensorDataLogger is the sink every accepted reading is forwarded to.
 * - open: acquire the underlying resource; throws AppError when that fails
 * - close: release it; safe to call more than once
 * - logSensorData: record one reading (readings the sink cannot store are skipped)
 */
export interface SensorDataLogger {
	readonly type: LogType | "none";

	open(): void;

	close(): void;

	logSensorData(reading: SensorReading): void;
}
