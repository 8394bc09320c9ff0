import { notImplemented } from "../lib/errors";
import type { SensorDataLogger } from "./types";

export const SQLITE_NOT_IMPLEMENTED_MESSAGE = "SQLite support not yet implemented, sorry.";

/**
 * Placeholder for database logging. The log type is accepted on the command
 * line, but opening it always fails before any file is touched.
 */
export class SqliteSensorLogger implements SensorDataLogger {
	readonly type = "SQLite";

	open(): void {
		throw notImplemented(SQLITE_NOT_IMPLEMENTED_MESSAGE);
	}

	close(): void {}

	logSensorData(): void {
		throw notImplemented(SQLITE_NOT_IMPLEMENTED_MESSAGE);
	}
}
