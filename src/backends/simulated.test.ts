import { afterEach, describe, expect, it, vi } from "vitest";

import { SensorDataType } from "../lib/sensor-data";
import type { SensorReading } from "../lib/sensor-data";
import { SimulatedBackend } from "./simulated";

// 14:00 UTC, the daily peak of the simulated curve
const PEAK_MS = Date.UTC(2024, 5, 1, 14, 0, 0);

describe("SimulatedBackend", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("knows its sensors before any broadcast, without values", async () => {
		const backend = new SimulatedBackend({ emitIntervalMs: 0 });

		const sensors = await backend.listSensors();

		expect(sensors.map(s => s.id)).toEqual([11, 135, 183]);
		expect(sensors.every(s => s.values.length === 0)).toBe(true);
	});

	it("queues one reading per sensor datatype on broadcast", () => {
		const backend = new SimulatedBackend({ emitIntervalMs: 0, now: () => PEAK_MS, random: () => 0.5 });
		const seen: SensorReading[] = [];
		backend.registerSensorEvent(r => seen.push(r));

		backend.broadcast();
		expect(seen).toEqual([]);
		expect(backend.processPendingCallbacks()).toBe(5);

		expect(seen.map(r => `${r.id}:${r.datatype}`)).toEqual(["11:1", "11:2", "135:1", "135:2", "183:1"]);
		expect(seen.every(r => r.timestamp === PEAK_MS / 1000)).toBe(true);
	});

	it("produces values on a daily curve around each sensor's base", () => {
		const backend = new SimulatedBackend({ emitIntervalMs: 0, now: () => PEAK_MS, random: () => 0.5 });
		const seen: SensorReading[] = [];
		backend.registerSensorEvent(r => seen.push(r));

		backend.broadcast();
		backend.processPendingCallbacks();

		// sin(2pi * (14/24 - 0.25)) = 0.866
		expect(seen.find(r => r.id === 11 && r.datatype === SensorDataType.Temperature)?.value).toBe("23.6");
		expect(seen.find(r => r.id === 11 && r.datatype === SensorDataType.Humidity)?.value).toBe("31.3");
		expect(seen.find(r => r.id === 183)?.value).toBe("0.6");
	});

	it("caches the last broadcast for listing", async () => {
		const backend = new SimulatedBackend({ emitIntervalMs: 0, now: () => PEAK_MS, random: () => 0.5 });

		backend.broadcast();
		const sensors = await backend.listSensors();

		expect(sensors[2].values).toHaveLength(1);
		expect(sensors[0].values.map(v => v.datatype)).toEqual([1, 2]);
	});

	it("broadcasts on its own timer once registered, until closed", async () => {
		vi.useFakeTimers();
		const backend = new SimulatedBackend({ emitIntervalMs: 1000, now: () => PEAK_MS, random: () => 0.5 });
		const cb = vi.fn();
		backend.registerSensorEvent(cb);

		vi.advanceTimersByTime(2000);
		expect(backend.processPendingCallbacks()).toBe(10);

		await backend.close();
		vi.advanceTimersByTime(2000);
		expect(backend.processPendingCallbacks()).toBe(0);
	});
});
