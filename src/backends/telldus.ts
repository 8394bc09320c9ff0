import type winston from "winston";
import { z } from "zod";

import { backendError, errorMessage } from "../lib/errors";
import { createSensorReading, SensorDataType } from "../lib/sensor-data";
import { formatIssues } from "../lib/validation";
import { QueuedCallbackDispatcher } from "./queued-dispatcher";
import type { SensorBackend, SensorEventCallback, SensorInfo } from "./types";

/**
 * The part of the `telldus` Node binding (telldus-core) used here. The binding
 * is a native addon built against the host's libtelldus-core, so it is
 * installed on the TellStick host and loaded by name at run time.
 */
export interface TelldusBinding {
	getSensors(callback: (err: unknown, sensors: unknown) => void): void;
	addSensorEventListener(listener: (...args: unknown[]) => void): unknown;
	removeEventListener?(listenerId: unknown): unknown;
}

const DATATYPE_NAMES: Readonly<Partial<Record<string, number>>> = {
	TEMPERATURE: SensorDataType.Temperature,
	HUMIDITY: SensorDataType.Humidity
};

const TelldusSensorSchema = z.object({
	id: z.number().int(),
	protocol: z.string(),
	model: z.string(),
	data: z
		.array(
			z.object({
				type: z.union([z.number().int(), z.string()]),
				value: z.union([z.string(), z.number()]),
				timestamp: z.number()
			})
		)
		.default([])
});

// (deviceId, protocol, model, datatype, value, timestamp)
const TelldusSensorEventSchema = z
	.tuple([z.number().int(), z.string(), z.string(), z.number().int(), z.union([z.string(), z.number()]), z.number()])
	.rest(z.unknown());

function toDatatype(type: number | string): number {
	if (typeof type === "number") return type;
	// unknown names map to 0, which displays as "unknown"
	return DATATYPE_NAMES[type.toUpperCase()] ?? 0;
}

function isTelldusBinding(value: unknown): value is TelldusBinding {
	return (
		typeof value === "object" &&
		value !== null &&
		"getSensors" in value &&
		typeof value.getSensors === "function" &&
		"addSensorEventListener" in value &&
		typeof value.addSensorEventListener === "function"
	);
}

export async function loadTelldusBinding(moduleName: string): Promise<TelldusBinding> {
	let mod: unknown;
	try {
		mod = await import(moduleName);
	} catch (err) {
		throw backendError(`Could not load Telldus binding '${moduleName}': ${errorMessage(err)}`, err);
	}

	if (isTelldusBinding(mod)) return mod;
	// CommonJS addon behind an ESM namespace
	if (typeof mod === "object" && mod !== null && "default" in mod && isTelldusBinding(mod.default)) {
		return mod.default;
	}

	throw backendError(`Module '${moduleName}' does not look like the Telldus binding`);
}

export class TelldusBackend implements SensorBackend {
	readonly name = "telldus";

	private readonly dispatcher = new QueuedCallbackDispatcher();
	private listenerId: unknown = null;
	private cid = 0;

	constructor(
		private readonly binding: TelldusBinding,
		private readonly logger?: winston.Logger
	) {}

	async listSensors(): Promise<SensorInfo[]> {
		const raw = await new Promise<unknown>((resolve, reject) => {
			this.binding.getSensors((err, sensors) => {
				if (err) return reject(err instanceof Error ? err : new Error(String(err)));
				resolve(sensors);
			});
		});

		const res = z.array(TelldusSensorSchema).safeParse(raw);
		if (!res.success) {
			throw backendError(`Unexpected sensor list from telldus: ${formatIssues(res.error)}`);
		}

		return res.data.map(s => ({
			id: s.id,
			protocol: s.protocol,
			model: s.model,
			values: s.data.map(d => ({
				datatype: toDatatype(d.type),
				value: d.value,
				timestamp: d.timestamp
			}))
		}));
	}

	registerSensorEvent(callback: SensorEventCallback): void {
		this.dispatcher.register(callback);
		if (this.listenerId !== null) return;

		this.listenerId = this.binding.addSensorEventListener((...args: unknown[]) => this.onSensorEvent(args));
		if (typeof this.listenerId === "number") {
			this.cid = this.listenerId;
		}
		this.logger?.info("Registered telldus sensor event listener (id=%s)", String(this.listenerId));
	}

	processPendingCallbacks(): number {
		return this.dispatcher.processPendingCallbacks();
	}

	async close(): Promise<void> {
		if (this.listenerId !== null) {
			this.binding.removeEventListener?.(this.listenerId);
			this.logger?.debug("Removed telldus sensor event listener (id=%s)", String(this.listenerId));
			this.listenerId = null;
		}
		this.dispatcher.clear();
	}

	private onSensorEvent(args: unknown[]): void {
		const res = TelldusSensorEventSchema.safeParse(args);
		if (!res.success) {
			this.logger?.warn("Dropping malformed telldus sensor event: %s", formatIssues(res.error));
			return;
		}

		const [id, protocol, model, datatype, value, timestamp] = res.data;
		this.dispatcher.enqueue(createSensorReading({ protocol, model, id, datatype, value, timestamp, cid: this.cid }));
	}
}
