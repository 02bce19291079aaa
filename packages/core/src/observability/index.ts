/**
 * Observability for Setu. Currently the structured logger only.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	getLoggingConfig,
	parseLogLevel,
	resetLoggingConfig,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggerConfig,
} from "./logger.js";
