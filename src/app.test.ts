import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import winston from "winston";

import { run } from "./app";
import type { AppDependencies } from "./app";
import { QueuedCallbackDispatcher } from "./backends/queued-dispatcher";
import type { SensorBackend, SensorEventCallback, SensorInfo } from "./backends";
import { createSensorReading, formatSensorData } from "./lib/sensor-data";
import type { SensorReading } from "./lib/sensor-data";

class ScriptedBackend implements SensorBackend {
	readonly name = "scripted";
	private readonly dispatcher = new QueuedCallbackDispatcher();
	closed = false;

	constructor(
		private readonly readings: SensorReading[],
		private readonly controller: AbortController,
		private readonly sensors: SensorInfo[] = []
	) {}

	async listSensors(): Promise<SensorInfo[]> {
		return this.sensors;
	}

	registerSensorEvent(callback: SensorEventCallback): void {
		this.dispatcher.register(callback);
		for (const r of this.readings) this.dispatcher.enqueue(r);
	}

	// one batch, then behave like Ctrl+C
	processPendingCallbacks(): number {
		const n = this.dispatcher.processPendingCallbacks();
		this.controller.abort();
		return n;
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

const oregon = (id: number): SensorReading =>
	createSensorReading({
		protocol: "oregon",
		model: "temp1",
		id,
		datatype: 1,
		value: 21.5,
		timestamp: 1700000000,
		cid: 0
	});

describe("run", () => {
	let dir: string;
	let logfile: string;
	let out: string[];
	let err: string[];
	let controller: AbortController;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "telltemp-app-"));
		logfile = path.join(dir, "sensors.csv");
		out = [];
		err = [];
		controller = new AbortController();
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	function deps(backend?: SensorBackend) {
		const createBackend = vi.fn(async (): Promise<SensorBackend> => backend ?? new ScriptedBackend([], controller));
		const d: AppDependencies & { createBackend: typeof createBackend } = {
			stdout: { write: (s: string) => out.push(s) },
			stderr: { write: (s: string) => err.push(s) },
			signal: controller.signal,
			env: { TELLTEMP_POLL_INTERVAL_MS: "1" },
			logger: winston.createLogger({ silent: true }),
			createBackend
		};
		return d;
	}

	const argv = (...args: string[]): string[] => ["node", "telltemp", ...args];

	it("reports SQLite as not implemented without creating a file or touching the hardware", async () => {
		const d = deps();

		const code = await run(argv("--logfile", logfile, "--logtype", "SQLite"), d);

		expect(code).toBe(1);
		expect(err.join("")).toBe("SQLite support not yet implemented, sorry.\n");
		expect(fs.existsSync(logfile)).toBe(false);
		expect(d.createBackend).not.toHaveBeenCalled();
	});

	it("prints a fatal message once and keeps it below the default log level", async () => {
		const d = deps();
		const logger = winston.createLogger({ silent: true });
		const error = vi.spyOn(logger, "error");
		const info = vi.spyOn(logger, "info");

		const code = await run(argv("-t", "SQLite"), { ...d, logger });

		expect(code).toBe(1);
		expect(err).toEqual(["SQLite support not yet implemented, sorry.\n"]);
		expect(error).not.toHaveBeenCalled();
		expect(info).toHaveBeenCalledWith(
			"Exiting (code=%s): %s",
			"NOT_IMPLEMENTED",
			"SQLite support not yet implemented, sorry."
		);
	});

	it("rejects SQLite even without a logfile", async () => {
		expect(await run(argv("-t", "SQLite"), deps())).toBe(1);
	});

	it("logs and prints an accepted reading, then exits cleanly on interrupt", async () => {
		const reading = oregon(5);
		const backend = new ScriptedBackend([reading], controller);

		const code = await run(argv("-f", logfile), deps(backend));

		expect(code).toBe(0);
		expect(out.join("")).toBe(`${formatSensorData(reading)}\n`);
		expect(fs.readFileSync(logfile, "utf8")).toBe("Timestamp,ID,Temperature,Humidity\n1700000000,5,21.5,\n");
		expect(backend.closed).toBe(true);
	});

	it("keeps filtered sensors off the console and out of the logfile", async () => {
		const backend = new ScriptedBackend([oregon(3)], controller);

		const code = await run(argv("--sensors", "1", "2", "-f", logfile), deps(backend));

		expect(code).toBe(0);
		expect(out.join("")).toBe("");
		expect(fs.readFileSync(logfile, "utf8")).toBe("Timestamp,ID,Temperature,Humidity\n");
	});

	it("cleans the heartbeat up on interrupt", async () => {
		const backend = new ScriptedBackend([], controller);

		await run(argv("--heartbeat"), deps(backend));

		expect(out.join("")).toBe("-\b\b\b");
	});

	it("fails on a logfile that cannot be opened", async () => {
		const missing = path.join(dir, "missing", "sensors.csv");
		const d = deps();

		const code = await run(argv("-f", missing), d);

		expect(code).toBe(1);
		expect(err.join("").startsWith(`Could not open logfile ${missing}: `)).toBe(true);
		expect(d.createBackend).not.toHaveBeenCalled();
	});

	it("lists sensors and exits", async () => {
		const backend = new ScriptedBackend([], controller, [
			{ id: 11, protocol: "fineoffset", model: "temperature", values: [] }
		]);

		const code = await run(argv("--list"), deps(backend));

		expect(code).toBe(0);
		expect(out.join("")).toBe(
			"Number of sensors: 1\n\nID    PROTOCOL        MODEL                  TEMP     HUMIDITY LAST UPDATED\n"
		);
		expect(backend.closed).toBe(true);
	});

	it("returns commander's exit code for help", async () => {
		const code = await run(argv("--help"), deps());

		expect(code).toBe(0);
		expect(out.join("")).toContain("Usage: telltemp [options]");
	});

	it("returns 2 for invalid sensor IDs", async () => {
		const code = await run(argv("-s", "abc"), deps());

		expect(code).toBe(2);
		expect(err.join("").startsWith("Invalid arguments: sensors.0:")).toBe(true);
	});

	it("reports backend failures", async () => {
		const d = deps();
		d.createBackend.mockRejectedValueOnce(new Error("TellStick not found"));

		const code = await run(argv(), d);

		expect(code).toBe(1);
		expect(err.join("")).toBe("TellStick not found\n");
	});
});
