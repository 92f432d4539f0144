import env from "../config/env";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: LogLevel[] = ["error", "warn", "info", "debug"];

export class Logger {
	constructor(
		private readonly level: LogLevel = env.LOG_LEVEL,
		private readonly scope?: string,
	) {}

	child(scope: string): Logger {
		return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
	}

	private shouldLog(level: LogLevel): boolean {
		return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
	}

	private format(level: LogLevel, message: string, data?: unknown): string {
		const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]${this.scope ? ` [${this.scope}]` : ""}`;
		if (data === undefined) {
			return `${prefix} ${message}`;
		}
		return `${prefix} ${message} ${JSON.stringify(data)}`;
	}

	error(message: string, data?: unknown): void {
		if (this.shouldLog("error")) console.error(this.format("error", message, data));
	}

	warn(message: string, data?: unknown): void {
		if (this.shouldLog("warn")) console.warn(this.format("warn", message, data));
	}

	info(message: string, data?: unknown): void {
		if (this.shouldLog("info")) console.info(this.format("info", message, data));
	}

	debug(message: string, data?: unknown): void {
		if (this.shouldLog("debug")) console.debug(this.format("debug", message, data));
	}
}

export const logger = new Logger();

export default logger;
