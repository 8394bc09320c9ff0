import { sensorValue } from "./backends/types";
import type { SensorBackend, SensorInfo } from "./backends";
import type { TextOutput } from "./lib/heartbeat";
import { formatTimestamp, SensorDataType } from "./lib/sensor-data";

function left(value: string | number, width: number): string {
	return String(value).padEnd(width);
}

export function formatSensorTableHeader(): string {
	return `${left("ID", 5)} ${left("PROTOCOL", 15)} ${left("MODEL", 22)} ${left("TEMP", 8)} ${left("HUMIDITY", 8)} LAST UPDATED`;
}

/**
 * One table row, or null for a sensor with neither temperature nor humidity.
 */
export function formatSensorRow(sensor: SensorInfo): string | null {
	const temperature = sensorValue(sensor, SensorDataType.Temperature);
	const humidity = sensorValue(sensor, SensorDataType.Humidity);

	if (!temperature && !humidity) return null;

	const timestamps = [temperature?.timestamp, humidity?.timestamp].filter((t): t is number => t !== undefined);
	const lastUpdated = formatTimestamp(Math.min(...timestamps));

	return (
		`${left(sensor.id, 5)} ${left(sensor.protocol, 15)} ${left(sensor.model, 22)} ` +
		`${left(temperature?.value ?? "", 9)}${left(humidity?.value ?? "", 9)}${lastUpdated}`
	);
}

/**
 * Print every known sensor that has a temperature or humidity value.
 */
export async function listSensors(backend: SensorBackend, output: TextOutput): Promise<void> {
	const sensors = await backend.listSensors();

	output.write(`Number of sensors: ${sensors.length}\n\n`);
	output.write(`${formatSensorTableHeader()}\n`);

	for (const sensor of sensors) {
		const row = formatSensorRow(sensor);
		if (row !== null) {
			output.write(`${row}\n`);
		}
	}
}
