import type winston from "winston";

import { CsvSensorLogger } from "./csv-logger";
import { NullSensorLogger } from "./null-logger";
import { SqliteSensorLogger } from "./sqlite-logger";
import type { LogType, SensorDataLogger } from "./types";

export type { LogType, SensorDataLogger } from "./types";

export interface SensorLoggerConfig {
	logfile?: string;
	logType: LogType;
	overwrite: boolean;
}

/**
 * Pick the sink for accepted readings. SQLite is selected, and fails on open,
 * even without a logfile.
 */
export function createSensorLogger(config: SensorLoggerConfig, logger?: winston.Logger): SensorDataLogger {
	if (config.logType === "SQLite") {
		return new SqliteSensorLogger();
	}
	if (!config.logfile) {
		return new NullSensorLogger();
	}
	return new CsvSensorLogger({
		logfile: config.logfile,
		overwrite: config.overwrite,
		logger
	});
}

/**
 * Run fn with the sensor logger open; it is closed on every way out of fn.
 */
export async function withSensorLogger<T>(
	sensorLogger: SensorDataLogger,
	fn: (sensorLogger: SensorDataLogger) => Promise<T>
): Promise<T> {
	sensorLogger.open();
	try {
		return await fn(sensorLogger);
	} finally {
		sensorLogger.close();
	}
}
