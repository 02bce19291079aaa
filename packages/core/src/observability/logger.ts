/**
 * Structured, pluggable logging for Setu.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the active level are dropped before any
 * formatting happens.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
};

const LOG_LEVEL_PARSE: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
};

/** Parse a level name ("debug", "WARN", ...). Returns undefined for unknown names. */
export function parseLogLevel(name: string): LogLevel | undefined {
	return LOG_LEVEL_PARSE[name.trim().toLowerCase()];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	/** Connection identifier for correlating a handshake with its frames */
	connectionId?: string;
	error?: { name: string; message: string; code?: string; stack?: string };
	/** Logger name that produced this entry */
	logger?: string;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to [ConsoleTransport]. */
	transports?: LogTransport[];
	/** Default context merged into every log entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Configure global logging defaults. Affects loggers created after this call.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

export function getLoggingConfig(): LoggerConfig {
	return { ...globalConfig };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── ANSI Colors ─────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";
const ANSI_BOLD = "\x1b[1m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",   // cyan
	[LogLevel.INFO]: "\x1b[32m",    // green
	[LogLevel.WARN]: "\x1b[33m",    // yellow
	[LogLevel.ERROR]: "\x1b[31m",   // red
	[LogLevel.FATAL]: "\x1b[35;1m", // bold magenta
};

// ─── Transports ──────────────────────────────────────────────────────────────

/**
 * Human-readable one-line output, colored when stdout is a TTY.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;

	constructor(opts?: { colors?: boolean }) {
		this.useColors = opts?.colors ?? (process.stdout.isTTY ?? false);
	}

	format(entry: LogEntry): string {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = LOG_LEVEL_NAMES[entry.level].padEnd(5);
		const name = entry.logger ? ` [${entry.logger}]` : "";

		let line = this.useColors
			? `${ANSI_DIM}${ts}${ANSI_RESET} ${LEVEL_COLORS[entry.level]}${lvl}${ANSI_RESET}${ANSI_BOLD}${name}${ANSI_RESET} ${entry.message}`
			: `${ts} ${lvl}${name} ${entry.message}`;

		const ctxKeys = Object.keys(entry.context);
		if (ctxKeys.length > 0) {
			const ctxStr = ctxKeys
				.map((k) => `${k}=${JSON.stringify(entry.context[k])}`)
				.join(" ");
			line += this.useColors ? ` ${ANSI_DIM}${ctxStr}${ANSI_RESET}` : ` ${ctxStr}`;
		}
		if (entry.connectionId) {
			line += ` conn=${entry.connectionId}`;
		}
		if (entry.error) {
			const code = entry.error.code ? ` (${entry.error.code})` : "";
			line += `\n  ${entry.error.name}${code}: ${entry.error.message}`;
		}
		return line;
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(this.format(entry) + "\n");
	}
}

/**
 * One JSON object per line, for log aggregation.
 */
export class JsonTransport implements LogTransport {
	format(entry: LogEntry): string {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: LOG_LEVEL_NAMES[entry.level],
			message: entry.message,
			logger: entry.logger,
		};
		if (Object.keys(entry.context).length > 0) obj.context = entry.context;
		if (entry.connectionId) obj.connectionId = entry.connectionId;
		if (entry.error) obj.error = entry.error;
		return JSON.stringify(obj);
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(this.format(entry) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Resolve the effective level: LOG_LEVEL env, then explicit config, then
 * global config, then INFO in production and DEBUG elsewhere.
 */
function resolveLevel(configLevel?: LogLevel): LogLevel {
	const envLevel = process.env.LOG_LEVEL ? parseLogLevel(process.env.LOG_LEVEL) : undefined;
	if (envLevel !== undefined) return envLevel;
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return process.env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
}

function serializeError(error: unknown): LogEntry["error"] {
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
		return { name: error.name, message: error.message, code, stack: error.stack };
	}
	return { name: "Error", message: String(error) };
}

export class Logger {
	private readonly name: string;
	private level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level);
		this.transports = config?.transports
			?? globalConfig.transports
			?? [new ConsoleTransport()];
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	/** Log an ERROR message with optional error object. */
	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/**
	 * Create a child logger named `parent:child`, sharing transports,
	 * level and context with the parent.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/**
	 * Return a new logger with additional context merged in.
	 * Does not mutate the original logger.
	 */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	getName(): string {
		return this.name;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(
		level: LogLevel,
		message: string,
		error?: unknown,
		ctx?: Record<string, unknown>,
	): void {
		if (level < this.level) return;

		const { connectionId, ...context } = { ...this.context, ...(ctx ?? {}) };
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LOG_LEVEL_NAMES[level],
			message,
			context,
			logger: this.name,
		};
		if (connectionId !== undefined) entry.connectionId = String(connectionId);
		if (error !== undefined) entry.error = serializeError(error);

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch (err) {
				// Report and move on to the next transport.
				process.stderr.write(`log transport failed: ${String(err)}\n`);
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Module identifier (e.g. "upgrade-server", "sandhi:codec")
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
