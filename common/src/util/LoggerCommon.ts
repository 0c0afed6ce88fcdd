import type { DestinationStream, Logger as PinoLogger, StreamEntry } from "pino";
import pino from "pino";

/**
 * Log stream type - using pino's native streams.
 * "console" and "file" are native pino types.
 */
export type LogStreamType = "console" | "file";

/**
 * Log level type - using pino's native levels
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Base logging transport configuration interface
 */
interface LoggingTransportConfig {
	/**
	 * Transport type: "console" or "file"
	 */
	type: LogStreamType;
	/**
	 * Transport-specific log level.
	 */
	level: LogLevel;
	/**
	 * Whether to use pretty-printing for this transport (only applicable to console transport).
	 */
	pretty: boolean;
}

/**
 * File transport configuration interface
 */
export interface FileTransportConfig extends LoggingTransportConfig {
	type: "file";
	/**
	 * Log file name prefix, e.g. "gateway". Rotated files are written as `${filenamePrefix}.<date>.<n>.log`.
	 */
	filenamePrefix: string;
	/**
	 * Directory path for log files.
	 */
	fileDirectoryPath: string;
	/**
	 * Maximum number of rotated files to keep.
	 */
	maxFiles: number;
	/**
	 * Maximum size of a log file before rotation, e.g. "500m". Units can be "k", "m", "g".
	 */
	maxSize: string;
}

/**
 * Console transport configuration interface
 */
export interface ConsoleTransportConfig extends LoggingTransportConfig {
	type: "console";
}

export type TransportConfig = FileTransportConfig | ConsoleTransportConfig;

/**
 * Logging configuration interface
 */
export interface LoggingConfig {
	/**
	 * Whether logging is enabled. If false, a no-op logger will be returned.
	 */
	enabled: boolean;
	/**
	 * Default log level
	 */
	level: LogLevel;
	/**
	 * Transports configuration
	 */
	transports: Array<TransportConfig>;
	/**
	 * Module-specific log level overrides, keyed by the file name without extension.
	 */
	moduleOverrides: Record<string, string | undefined>;
}

const transports = new Map<LogStreamType, DestinationStream>();

function getServerTransport(transportConfig: TransportConfig): DestinationStream {
	const existing = transports.get(transportConfig.type);
	if (existing) {
		return existing;
	}

	let stream: DestinationStream;
	if (transportConfig.type === "file") {
		const { filenamePrefix, fileDirectoryPath, maxFiles, maxSize, level } = transportConfig;
		stream = pino.transport({
			targets: [
				{
					target: "pino-roll",
					level,
					options: {
						file: `${fileDirectoryPath}/${filenamePrefix}`,
						frequency: "daily",
						size: maxSize,
						extension: ".log",
						mkdir: true,
						limit: {
							count: maxFiles,
						},
					},
				},
			],
		});
	} else if (transportConfig.pretty) {
		stream = pino.transport({
			target: "pino-pretty",
			level: transportConfig.level,
			options: {
				colorize: true,
				translateTime: "yyyy-mm-dd HH:MM:ss",
				ignore: "pid,hostname",
				messageFormat: "{module} - {msg}",
				singleLine: true,
			},
		});
	} else {
		stream = process.stdout;
	}
	transports.set(transportConfig.type, stream);
	return stream;
}

/**
 * Derives the module name from a module URL or name: the file name without its extension.
 */
export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a logging configuration.
 *
 * @param transportNames comma-separated transport names, e.g. "console,file"
 * @param moduleOverrides module-specific levels in the format "module1:level1,module2:level2"
 */
export function createLoggingConfig(
	enabled: boolean,
	filenamePrefix: string,
	level: LogLevel,
	pretty: boolean,
	transportNames: string,
	moduleOverrides: string,
	fileDirectoryPath: string,
	maxFiles = 14,
	maxSize = "500m",
): LoggingConfig {
	const names = transportNames.split(",").map(t => t.trim());
	const transportConfigs: Array<TransportConfig> = [];
	for (const transport of names) {
		if (transport === "file") {
			transportConfigs.push({
				type: "file",
				filenamePrefix,
				fileDirectoryPath,
				maxFiles,
				maxSize,
				level,
				pretty,
			});
		}
		if (transport === "console") {
			transportConfigs.push({ type: "console", level, pretty });
		}
	}
	const overrides: Record<string, string> = {};
	if (moduleOverrides) {
		for (const pair of moduleOverrides.split(",")) {
			const [module, lvl] = pair.split(":");
			if (module && lvl) {
				overrides[module.trim()] = lvl.trim();
			}
		}
	}
	return {
		enabled,
		level,
		transports: transportConfigs,
		moduleOverrides: overrides,
	};
}

/**
 * Configures server-side logging based on environment variables:
 * - DISABLE_LOGGING: "true" disables logging entirely (no-op logger).
 * - LOG_LEVEL: default level, "info" when unset or invalid.
 * - LOG_PRETTY: pretty-print console output (defaults to true in development).
 * - LOG_TRANSPORTS: comma-separated list, e.g. "console,file" (defaults to console).
 * - LOG_LEVEL_OVERRIDES: per-module levels, e.g. "ProcessRunner:debug,McpRouter:warn".
 * - LOG_FILE_NAME_PREFIX, LOG_FILE_DIRECTORY_PATH, LOG_FILE_MAX_FILES: file transport settings.
 */
export function getLoggingConfig(): LoggingConfig {
	const enabled = process.env.DISABLE_LOGGING !== "true";
	const isDevelopment = process.env.NODE_ENV === "development";
	const rawLevel = process.env.LOG_LEVEL ?? "info";
	const level = isLogLevel(rawLevel) ? rawLevel : "info";
	const pretty = (process.env.LOG_PRETTY ?? (isDevelopment ? "true" : "false")) === "true";
	return createLoggingConfig(
		enabled,
		process.env.LOG_FILE_NAME_PREFIX ?? "gateway",
		level,
		pretty,
		process.env.LOG_TRANSPORTS ?? "console",
		process.env.LOG_LEVEL_OVERRIDES ?? "",
		process.env.LOG_FILE_DIRECTORY_PATH ?? "./logs",
		Number(process.env.LOG_FILE_MAX_FILES ?? "14"),
	);
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	const streams: Array<StreamEntry> = config.transports.map(transportConfig => ({
		level: transportConfig.level,
		stream: getServerTransport(transportConfig),
	}));
	if (streams.length > 1) {
		return pino({ level: config.level }, pino.multistream(streams));
	}
	if (streams.length === 1) {
		return pino({ level: config.level }, streams[0].stream);
	}
	return pino({ level: config.level });
}

function validateLogLevel(logName: string, logLevel: string | undefined): LogLevel | undefined {
	if (!logLevel) {
		return;
	}
	const level = logLevel.toLowerCase();
	if (!isLogLevel(level)) {
		// biome-ignore lint/suspicious/noConsole: the logger itself is misconfigured
		console.log(`Unable to set ${logName} log level to ${logLevel}; valid values are: ${LOG_LEVELS.join(",")}`);
		return;
	}
	return level;
}

// Helper to get the more verbose (lower priority number) level
function getMinimumLevel(level1: LogLevel, level2: LogLevel): LogLevel {
	const levels = pino.levels.values;
	return levels[level1] < levels[level2] ? level1 : level2;
}

// Create a child logger for a specific module with optional level override
function createModuleLogger(
	moduleName: string,
	loggingConfig: LoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger,
): PinoLogger {
	const childLevel = validateLogLevel(moduleName, loggingConfig.moduleOverrides[moduleName]);
	const effectiveLevel = childLevel ?? loggingConfig.level;

	// A more verbose child needs a parent (and transports) at least that verbose
	const parentLevel = getMinimumLevel(effectiveLevel, loggingConfig.level);
	const logger = defaultLoggerProvider({
		...loggingConfig,
		level: parentLevel,
		transports: loggingConfig.transports.map(t => ({ ...t, level: parentLevel })),
	});

	return logger.child({ module: moduleName }, { level: effectiveLevel });
}

// Type alias for compatibility
export type Logger = PinoLogger;

let noopLoggerInstance: Logger | undefined;

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * To use in a module, call `createLog(import.meta)` near the top of the file (after imports).
 *
 * If the logging config has enabled=false, a silent logger is returned.
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider: () => LoggingConfig = getLoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger = createDefaultLogger,
): Logger {
	const config = loggingConfigProvider();

	if (!config.enabled) {
		if (!noopLoggerInstance) {
			noopLoggerInstance = pino({ enabled: false });
		}
		return noopLoggerInstance;
	}

	return createModuleLogger(getModuleName(module), config, defaultLoggerProvider);
}
