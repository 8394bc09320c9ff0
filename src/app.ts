import { CommanderError } from "commander";
import type winston from "winston";

import { createSensorBackend } from "./backends";
import type { BackendConfig, SensorBackend } from "./backends";
import { loadConfig } from "./lib/config";
import type { AppConfig } from "./lib/config";
import { AppError, asAppError } from "./lib/errors";
import { Heartbeat } from "./lib/heartbeat";
import type { TextOutput } from "./lib/heartbeat";
import { createLogger } from "./lib/log";
import { listSensors } from "./list-sensors";
import { createSensorLogger, withSensorLogger } from "./loggers";
import { SensorEventHandler } from "./sensor-event-handler";
import { runSensorEventLoop } from "./sensor-event-loop";

export interface AppDependencies {
	stdout: TextOutput;
	stderr: TextOutput;
	/** Aborting stops the event loop */
	signal: AbortSignal;
	env?: NodeJS.ProcessEnv;
	logger?: winston.Logger;
	createBackend?: (config: BackendConfig, logger: winston.Logger) => Promise<SensorBackend>;
}

interface Context {
	config: AppConfig;
	logger: winston.Logger;
	deps: AppDependencies;
}

async function withBackend<T>(ctx: Context, fn: (backend: SensorBackend) => Promise<T>): Promise<T> {
	const create = ctx.deps.createBackend ?? createSensorBackend;
	const backend = await create(ctx.config.backend, ctx.logger);
	try {
		return await fn(backend);
	} finally {
		await backend.close();
	}
}

async function runList(ctx: Context): Promise<void> {
	ctx.logger.info("Listing sensors (backend=%s)", ctx.config.backend.type);
	await withBackend(ctx, backend => listSensors(backend, ctx.deps.stdout));
}

async function runMonitor(ctx: Context): Promise<void> {
	const { config, logger, deps } = ctx;

	const sensorLogger = createSensorLogger(
		{ logfile: config.logfile, logType: config.logType, overwrite: config.overwrite },
		logger
	);

	// Opening the logger comes first: a bad logfile or log type fails before the hardware is touched
	await withSensorLogger(sensorLogger, sensorLogger =>
		withBackend(ctx, backend => {
			const handler = new SensorEventHandler({
				sensorLogger,
				output: deps.stdout,
				heartbeat: config.heartbeat ? new Heartbeat(deps.stdout) : undefined,
				sensors: config.sensors,
				silent: config.silent,
				verbose: config.verbose,
				logger
			});

			return runSensorEventLoop(backend, handler, {
				signal: deps.signal,
				intervalMs: config.pollIntervalMs,
				logger
			});
		})
	);
}

/**
 * Parse argv (process.argv layout), then either list sensors or poll for
 * readings until the signal aborts. Returns the process exit code.
 */
export async function run(argv: readonly string[], deps: AppDependencies): Promise<number> {
	let config: AppConfig;
	try {
		config = loadConfig(argv, deps.env ?? process.env, { stdout: deps.stdout, stderr: deps.stderr });
	} catch (err) {
		// commander has already printed usage or help
		if (err instanceof CommanderError) return err.exitCode;
		if (err instanceof AppError) {
			deps.stderr.write(`${err.message}\n`);
			return err.exitCode;
		}
		throw err;
	}

	const logger =
		deps.logger ??
		createLogger({
			serviceName: "telltemp",
			level: config.logLevel,
			logDir: config.logDir
		});

	const ctx: Context = { config, logger, deps };

	try {
		if (config.list) {
			await runList(ctx);
		} else {
			await runMonitor(ctx);
		}
	} catch (err) {
		const appErr = asAppError(err);
		// the message itself goes to stderr below
		logger.info("Exiting (code=%s): %s", appErr.code, appErr.message);
		deps.stderr.write(`${appErr.message}\n`);
		return appErr.exitCode;
	}

	logger.info("telltemp exiting");
	return 0;
}
