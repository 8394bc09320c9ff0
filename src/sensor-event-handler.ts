import type winston from "winston";

import type { Heartbeat, TextOutput } from "./lib/heartbeat";
import { formatSensorData } from "./lib/sensor-data";
import type { SensorReading } from "./lib/sensor-data";
import type { SensorDataLogger } from "./loggers";

export interface SensorEventHandlerOptions {
	sensorLogger: SensorDataLogger;
	output: TextOutput;
	heartbeat?: Heartbeat;
	/** Sensor IDs to accept; all sensors when absent or empty */
	sensors?: readonly number[];
	silent?: boolean;
	verbose?: boolean;
	logger?: winston.Logger;
}

/**
 * Handles sensor data events: prints accepted readings to the console and
 * forwards them to the sensor logger.
 */
export class SensorEventHandler {
	private readonly sensors: ReadonlySet<number> | null;
	private exited = false;

	constructor(private readonly opts: SensorEventHandlerOptions) {
		this.sensors = opts.sensors && opts.sensors.length > 0 ? new Set(opts.sensors) : null;
	}

	accepts(id: number): boolean {
		return this.sensors === null || this.sensors.has(id);
	}

	handleSensorEvent(reading: SensorReading): void {
		if (this.accepts(reading.id)) {
			this.opts.logger?.debug(
				"Sensor event id=%d datatype=%d value=%s ts=%d",
				reading.id,
				reading.datatype,
				String(reading.value),
				reading.timestamp
			);
			this.printSensorData(reading);
			this.opts.sensorLogger.logSensorData(reading);
		} else if (this.opts.verbose) {
			this.opts.output.write(`Ignoring sensor with ID ${reading.id}\n`);
		} else {
			this.opts.logger?.debug("Ignored sensor event id=%d", reading.id);
		}
	}

	handleLoop(): void {
		this.opts.heartbeat?.printOutput();
	}

	handleExit(): void {
		if (this.exited) return;
		this.exited = true;
		this.opts.heartbeat?.cleanUp();
	}

	private printSensorData(reading: SensorReading): void {
		if (this.opts.silent) return;

		const heartbeat = this.opts.heartbeat;
		heartbeat?.erase();
		this.opts.output.write(`${formatSensorData(reading)}\n`);
		// the line just printed replaced the glyph; don't erase into it
		heartbeat?.dontFlush();
	}
}
