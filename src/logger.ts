/**
 * Context-scoped console logger with level filtering.
 *
 * Defaults come from `settings.logging`; tests pass an explicit level.
 */

import { type LogLevelName, settings } from "./settings.ts";

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
};

const RESET_COLOR = "\x1b[0m";

export function toLogLevel(name: LogLevelName): LogLevel {
	switch (name) {
		case "debug":
			return LogLevel.DEBUG;
		case "info":
			return LogLevel.INFO;
		case "warn":
			return LogLevel.WARN;
		case "error":
			return LogLevel.ERROR;
	}
}

export interface LoggerOptions {
	readonly level?: LogLevel;
	readonly colorize?: boolean;
}

export class Logger {
	private readonly level: LogLevel;
	private readonly colorize: boolean;

	constructor(
		private readonly context: string,
		options: LoggerOptions = {},
	) {
		this.level = options.level ?? toLogLevel(settings.logging.level);
		this.colorize = options.colorize ?? settings.logging.colorize;
	}

	debug(message: string, meta?: unknown): void {
		this.log(LogLevel.DEBUG, message, meta);
	}

	info(message: string, meta?: unknown): void {
		this.log(LogLevel.INFO, message, meta);
	}

	warn(message: string, meta?: unknown): void {
		this.log(LogLevel.WARN, message, meta);
	}

	error(message: string, meta?: unknown): void {
		this.log(LogLevel.ERROR, message, meta);
	}

	isEnabled(level: LogLevel): boolean {
		return level >= this.level;
	}

	private log(level: LogLevel, message: string, meta?: unknown): void {
		if (!this.isEnabled(level)) return;

		const timestamp = new Date().toISOString();
		const levelName = LOG_LEVEL_NAMES[level].padEnd(5);
		const contextStr = this.context ? `[${this.context}]` : "";

		let line = this.colorize
			? `${LOG_LEVEL_COLORS[level]}${timestamp} ${levelName}${RESET_COLOR} ${contextStr} ${message}`
			: `${timestamp} ${levelName} ${contextStr} ${message}`;
		if (meta !== undefined) {
			line += ` ${JSON.stringify(meta)}`;
		}

		switch (level) {
			case LogLevel.DEBUG:
			case LogLevel.INFO:
				console.log(line);
				break;
			case LogLevel.WARN:
				console.warn(line);
				break;
			case LogLevel.ERROR:
				console.error(line);
				break;
		}
	}
}

export function createLogger(context: string, options?: LoggerOptions): Logger {
	return new Logger(context, options);
}
