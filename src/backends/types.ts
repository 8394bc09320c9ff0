import type { SensorReading, SensorValue } from "../lib/sensor-data";

export type SensorEventCallback = (reading: SensorReading) => void;

export interface SensorValueInfo {
	datatype: number;
	value: SensorValue;
	/** Unix time, seconds */
	timestamp: number;
}

export interface SensorInfo {
	id: number;
	protocol: string;
	model: string;
	/** Last value the transceiver cached per datatype */
	values: SensorValueInfo[];
}

/**
 * SensorBackend is the boundary to the transceiver SDK.
 * - name: backend identifier used on the command line
 * - listSensors: every sensor the SDK knows, with cached values
 * - registerSensorEvent: subscribe to readings; they are queued until drained
 * - processPendingCallbacks: deliver queued readings to the callbacks, returns how many
 * - close: unsubscribe and release the SDK
 */
export interface SensorBackend {
	readonly name: string;

	listSensors(): Promise<SensorInfo[]>;

	registerSensorEvent(callback: SensorEventCallback): void;

	processPendingCallbacks(): number;

	close(): Promise<void>;
}

export function sensorValue(sensor: SensorInfo, datatype: number): SensorValueInfo | undefined {
	return sensor.values.find(v => v.datatype === datatype);
}
