/**
 * Runtime settings, read once from the environment with defaults.
 *
 * - `REQEXPECT_LOG_LEVEL`: debug | info | warn | error (default info)
 * - `REQEXPECT_LOG_COLOR`: set to `0` to disable ANSI colors
 *   (colors are also off when `NODE_ENV=production`)
 */

export type LogLevelName = "debug" | "info" | "warn" | "error";

export function parseLogLevelName(raw: string | undefined): LogLevelName {
	switch (raw?.toLowerCase()) {
		case "debug":
			return "debug";
		case "warn":
			return "warn";
		case "error":
			return "error";
		default:
			return "info";
	}
}

export const settings = {
	logging: {
		level: parseLogLevelName(process.env.REQEXPECT_LOG_LEVEL),
		colorize: process.env.REQEXPECT_LOG_COLOR !== "0" && process.env.NODE_ENV !== "production",
	},
};
