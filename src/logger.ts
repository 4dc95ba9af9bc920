import pino from "pino";

/**
 * Root logger. Level from TOLLBOOTH_LOG_LEVEL, default "warn" so library
 * use stays quiet; compile progress is logged at debug.
 */
export const logger = pino({
	name: "tollbooth",
	level: process.env.TOLLBOOTH_LOG_LEVEL ?? "warn",
});

export type { Logger } from "pino";
