/**
 * Datatype codes reported by telldus-core. Only temperature and humidity are
 * handled; every other code is displayed as "unknown".
 */
export const SensorDataType = {
	Temperature: 1,
	Humidity: 2
} as const;

export type SensorValue = string | number;

export interface SensorReading {
	readonly protocol: string;
	readonly model: string;
	readonly id: number;
	readonly datatype: number;
	readonly value: SensorValue;
	/** Unix time, seconds */
	readonly timestamp: number;
	/** Callback id of the registration that delivered the reading */
	readonly cid: number;
}

const DATATYPE_NAMES: ReadonlyMap<number, string> = new Map<number, string>([
	[SensorDataType.Temperature, "temperature"],
	[SensorDataType.Humidity, "humidity"]
]);

export function createSensorReading(fields: SensorReading): SensorReading {
	return Object.freeze({ ...fields });
}

export function datatypeToString(datatype: number): string {
	return DATATYPE_NAMES.get(datatype) ?? "unknown";
}

function pad2(n: number): string {
	return String(n).padStart(2, "0");
}

/**
 * Local time, e.g. 2015-02-16 13:37:00
 */
export function formatTimestamp(unixSeconds: number): string {
	const d = new Date(unixSeconds * 1000);
	const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
	const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
	return `${date} ${time}`;
}

// Format: 2015-02-16 13:37:00 SENSOR 123 [protocol/model] temperature value: -1.23
export function formatSensorData(reading: SensorReading): string {
	return `${formatTimestamp(reading.timestamp)} SENSOR ${reading.id} [${reading.protocol}/${reading.model}] ${datatypeToString(reading.datatype)} value: ${reading.value}`;
}
