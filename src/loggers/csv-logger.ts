import fs from "node:fs";
import type winston from "winston";

import { CSV_NEWLINE, toCsvRow } from "../lib/csv";
import type { CsvValue } from "../lib/csv";
import { logfileError } from "../lib/errors";
import { SensorDataType } from "../lib/sensor-data";
import type { SensorReading } from "../lib/sensor-data";
import type { SensorDataLogger } from "./types";

export const CSV_HEADER = ["Timestamp", "ID", "Temperature", "Humidity"] as const;

export interface CsvSensorLoggerOptions {
	logfile: string;
	/** Truncate an existing file instead of appending to it. */
	overwrite?: boolean;
	logger?: winston.Logger;
}

/**
 * Logs sensor data to a logfile with comma-separated values.
 */
export class CsvSensorLogger implements SensorDataLogger {
	readonly type = "CSV";

	private fd: number | null = null;

	constructor(private readonly opts: CsvSensorLoggerOptions) {}

	open(): void {
		if (this.fd !== null) return;

		const overwrite = this.opts.overwrite ?? false;
		const newFile = !fs.existsSync(this.opts.logfile);

		try {
			this.fd = fs.openSync(this.opts.logfile, overwrite ? "w" : "a");
		} catch (err) {
			throw logfileError(this.opts.logfile, err);
		}

		this.opts.logger?.info(
			"Opened logfile %s (mode=%s new=%s)",
			this.opts.logfile,
			overwrite ? "overwrite" : "append",
			String(newFile)
		);

		if (newFile || overwrite) {
			this.writeRow(CSV_HEADER);
		}
	}

	close(): void {
		if (this.fd === null) return;
		fs.closeSync(this.fd);
		this.fd = null;
		this.opts.logger?.debug("Closed logfile %s", this.opts.logfile);
	}

	logSensorData(reading: SensorReading): void {
		let temperature: CsvValue = "";
		let humidity: CsvValue = "";

		if (reading.datatype === SensorDataType.Temperature) {
			temperature = reading.value;
		} else if (reading.datatype === SensorDataType.Humidity) {
			humidity = reading.value;
		} else {
			return;
		}

		this.writeRow([reading.timestamp, reading.id, temperature, humidity]);
	}

	private writeRow(values: readonly CsvValue[]): void {
		if (this.fd === null) {
			throw new Error(`Logfile ${this.opts.logfile} is not open`);
		}
		fs.writeSync(this.fd, toCsvRow(values) + CSV_NEWLINE);
	}
}
