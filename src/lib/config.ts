import "dotenv/config";
import { Command, Option } from "commander";
import { z } from "zod";

import { BACKEND_TYPES } from "../backends";
import type { BackendConfig } from "../backends";
import type { LogType } from "../loggers";
import { DEFAULT_POLL_INTERVAL_MS } from "../sensor-event-loop";
import { configError } from "./errors";
import type { TextOutput } from "./heartbeat";
import { LOG_LEVELS } from "./log";
import type { LogLevel } from "./log";
import { formatIssues } from "./validation";

export interface AppConfig {
	/** One-shot sensor table instead of the event loop */
	list: boolean;
	heartbeat: boolean;
	logfile?: string;
	logType: LogType;
	overwrite: boolean;
	sensors?: number[];
	silent: boolean;
	verbose: boolean;

	backend: BackendConfig;
	pollIntervalMs: number;

	logLevel: LogLevel;
	logDir?: string;
}

export interface CliOutput {
	stdout: TextOutput;
	stderr: TextOutput;
}

/* ---------- defaults ---------- */

const DEFAULT_LOG_LEVEL: LogLevel = "warn";
const DEFAULT_TELLDUS_MODULE = "telldus";

/* ---------- validation ---------- */

const CliOptionsSchema = z.object({
	heartbeat: z.boolean().default(false),
	list: z.boolean().default(false),
	logfile: z.string().trim().min(1, "logfile must not be empty").optional(),
	logtype: z.enum(["CSV", "SQLite"]).default("CSV"),
	overwrite: z.boolean().default(false),
	sensors: z
		.array(
			z
				.string()
				.trim()
				.min(1, "sensor IDs must not be empty")
				.pipe(z.coerce.number().int("sensor IDs must be integers"))
		)
		.optional(),
	silent: z.boolean().default(false),
	verbose: z.boolean().default(false),
	backend: z.enum(BACKEND_TYPES).optional()
});

const EnvSchema = z.object({
	TELLTEMP_LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
	LOG_LEVEL: z.string().optional(),
	TELLTEMP_LOG_DIR: z.string().trim().min(1).optional(),
	TELLTEMP_BACKEND: z.enum(BACKEND_TYPES).optional(),
	TELLTEMP_TELLDUS_MODULE: z.string().trim().min(1).optional(),
	TELLTEMP_POLL_INTERVAL_MS: z.coerce.number().positive().optional()
});

function toLogLevel(value: string | undefined): LogLevel | undefined {
	const lower = value?.toLowerCase();
	return LOG_LEVELS.find(l => l === lower);
}

function parseCommandLine(argv: readonly string[], output?: CliOutput): z.infer<typeof CliOptionsSchema> {
	const program = new Command();

	program
		.name("telltemp")
		.description(
			"Get sensor values from Tellstick temperature and humidity sensors and print them or log them to a file or database"
		)
		.option("-b, --heartbeat", "Will print an updating character to the terminal while waiting for sensor events.")
		.option("-l, --list", "List available sensors and exit")
		.option("-f, --logfile <filename>", "File to log sensor data to. Will be created if it does not exist.")
		.addOption(
			new Option("-t, --logtype <type>", "Type of logfile (CSV = comma-separated values)")
				.choices(["CSV", "SQLite"])
				.default("CSV")
		)
		.option("-w, --overwrite", "Will overwrite the logfile if it exists and create a new one.")
		.option("-s, --sensors <sensorIds...>", "Device IDs of sensors to print values from (Default: All)")
		.option("-i, --silent", "Will not print anything to the terminal")
		.option("-v, --verbose", "Print verbose output")
		.addOption(new Option("--backend <name>", "Sensor backend").choices([...BACKEND_TYPES]))
		.exitOverride();

	if (output) {
		program.configureOutput({
			writeOut: str => output.stdout.write(str),
			writeErr: str => output.stderr.write(str)
		});
	}

	program.parse([...argv]);

	const res = CliOptionsSchema.safeParse(program.opts());
	if (!res.success) {
		throw configError(`Invalid arguments: ${formatIssues(res.error)}`, res.error.issues);
	}
	return res.data;
}

function parseEnv(env: NodeJS.ProcessEnv): z.infer<typeof EnvSchema> {
	const res = EnvSchema.safeParse(env);
	if (!res.success) {
		throw configError(`Invalid environment: ${formatIssues(res.error)}`, res.error.issues);
	}
	return res.data;
}

/* ---------- public API ---------- */

/**
 * Build the configuration from command line arguments (process.argv layout)
 * and environment. Throws CommanderError for usage errors and --help.
 */
export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env, output?: CliOutput): AppConfig {
	const opts = parseCommandLine(argv, output);
	const e = parseEnv(env);

	return {
		list: opts.list,
		heartbeat: opts.heartbeat,
		logfile: opts.logfile,
		logType: opts.logtype,
		overwrite: opts.overwrite,
		sensors: opts.sensors,
		silent: opts.silent,
		verbose: opts.verbose,
		backend: {
			type: opts.backend ?? e.TELLTEMP_BACKEND ?? "telldus",
			telldusModule: e.TELLTEMP_TELLDUS_MODULE ?? DEFAULT_TELLDUS_MODULE
		},
		pollIntervalMs: e.TELLTEMP_POLL_INTERVAL_MS ?? DEFAULT_POLL_INTERVAL_MS,
		logLevel: e.TELLTEMP_LOG_LEVEL ?? toLogLevel(e.LOG_LEVEL) ?? DEFAULT_LOG_LEVEL,
		logDir: e.TELLTEMP_LOG_DIR
	};
}
