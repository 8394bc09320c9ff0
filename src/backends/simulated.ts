import type winston from "winston";

import { createSensorReading, SensorDataType } from "../lib/sensor-data";
import { QueuedCallbackDispatcher } from "./queued-dispatcher";
import type { SensorBackend, SensorEventCallback, SensorInfo, SensorValueInfo } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

interface SimulatedSensor {
	id: number;
	protocol: string;
	model: string;
	datatypes: number[];
	/** Daily mean temperature, C */
	baseTemp: number;
	/** Daily mean relative humidity, % */
	baseHumidity: number;
}

const SIMULATED_SENSORS: readonly SimulatedSensor[] = [
	{
		id: 11,
		protocol: "fineoffset",
		model: "temperaturehumidity",
		datatypes: [SensorDataType.Temperature, SensorDataType.Humidity],
		baseTemp: 21,
		baseHumidity: 40
	},
	{
		id: 135,
		protocol: "mandolyn",
		model: "temperaturehumidity",
		datatypes: [SensorDataType.Temperature, SensorDataType.Humidity],
		baseTemp: 4,
		baseHumidity: 80
	},
	{
		id: 183,
		protocol: "fineoffset",
		model: "temperature",
		datatypes: [SensorDataType.Temperature],
		baseTemp: -2,
		baseHumidity: 0
	}
];

export interface SimulatedBackendOptions {
	/** How often every sensor broadcasts, ms. 0 disables the timer. */
	emitIntervalMs?: number;
	now?: () => number;
	random?: () => number;
	logger?: winston.Logger;
}

function round1(n: number): number {
	return Math.round(n * 10) / 10;
}

/**
 * Stand-in for a TellStick: a few sensors broadcasting plausible indoor and
 * outdoor readings. Readings arrive on a timer, outside the poll loop, and are
 * queued like the real SDK does.
 */
export class SimulatedBackend implements SensorBackend {
	readonly name = "simulated";

	private readonly dispatcher = new QueuedCallbackDispatcher();
	private readonly lastValues = new Map<number, SensorValueInfo[]>();
	private readonly now: () => number;
	private readonly random: () => number;
	private timer: NodeJS.Timeout | undefined;

	constructor(private readonly opts: SimulatedBackendOptions = {}) {
		this.now = opts.now ?? Date.now;
		this.random = opts.random ?? Math.random;
	}

	async listSensors(): Promise<SensorInfo[]> {
		return SIMULATED_SENSORS.map(s => ({
			id: s.id,
			protocol: s.protocol,
			model: s.model,
			values: [...(this.lastValues.get(s.id) ?? [])]
		}));
	}

	registerSensorEvent(callback: SensorEventCallback): void {
		this.dispatcher.register(callback);

		const intervalMs = this.opts.emitIntervalMs ?? 2000;
		if (this.timer || intervalMs <= 0) return;

		this.timer = setInterval(() => this.broadcast(), intervalMs);
		// the poll loop, not the simulator, keeps the process alive
		this.timer.unref();
		this.opts.logger?.info("Simulated sensors broadcasting every %dms", intervalMs);
	}

	processPendingCallbacks(): number {
		return this.dispatcher.processPendingCallbacks();
	}

	async close(): Promise<void> {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = undefined;
		}
		this.dispatcher.clear();
	}

	/**
	 * One broadcast round: every sensor reports each of its datatypes.
	 */
	broadcast(): void {
		const nowMs = this.now();
		const timestamp = Math.floor(nowMs / 1000);

		for (const sensor of SIMULATED_SENSORS) {
			const values: SensorValueInfo[] = [];

			for (const datatype of sensor.datatypes) {
				const value = this.simulatedValue(sensor, datatype, nowMs);
				values.push({ datatype, value: value.toFixed(1), timestamp });
				this.dispatcher.enqueue(
					createSensorReading({
						protocol: sensor.protocol,
						model: sensor.model,
						id: sensor.id,
						datatype,
						value: value.toFixed(1),
						timestamp,
						cid: 1
					})
				);
			}

			this.lastValues.set(sensor.id, values);
		}
	}

	private simulatedValue(sensor: SimulatedSensor, datatype: number, nowMs: number): number {
		// phase 0 = midnight, peak at ~14:00
		const phase = 2 * Math.PI * ((nowMs % DAY_MS) / DAY_MS - 0.25);
		const jitter = (this.random() * 2 - 1) * 0.2;

		if (datatype === SensorDataType.Humidity) {
			// humidity falls as temperature rises
			const humidity = sensor.baseHumidity - 10 * Math.sin(phase) + jitter;
			return round1(Math.min(100, Math.max(0, humidity)));
		}
		return round1(sensor.baseTemp + 3 * Math.sin(phase) + jitter);
	}
}
