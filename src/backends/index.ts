import type winston from "winston";

import { SimulatedBackend } from "./simulated";
import { loadTelldusBinding, TelldusBackend } from "./telldus";
import type { SensorBackend } from "./types";

export type { SensorBackend, SensorEventCallback, SensorInfo, SensorValueInfo } from "./types";

export const BACKEND_TYPES = ["telldus", "simulated"] as const;

export type BackendType = (typeof BACKEND_TYPES)[number];

export interface BackendConfig {
	type: BackendType;
	/** Module name of the telldus-core binding */
	telldusModule: string;
}

export async function createSensorBackend(config: BackendConfig, logger?: winston.Logger): Promise<SensorBackend> {
	switch (config.type) {
		case "telldus": {
			const binding = await loadTelldusBinding(config.telldusModule);
			logger?.info("Loaded telldus binding '%s'", config.telldusModule);
			return new TelldusBackend(binding, logger);
		}
		case "simulated":
			return new SimulatedBackend({ logger });
	}
}
