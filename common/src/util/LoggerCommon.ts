import type { DestinationStream, Logger as PinoLogger, StreamEntry } from "pino";
import pino from "pino";

export type LogStreamType = "console" | "file";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

interface TransportConfigBase {
	type: LogStreamType;
	level: LogLevel;
	/** Only applies to the console transport. */
	pretty: boolean;
}

/**
 * Rotated log files written through pino-roll, e.g. `logs/storefront.2026-01-31.1.log`.
 */
export interface FileTransportConfig extends TransportConfigBase {
	type: "file";
	filenamePrefix: string;
	fileDirectoryPath: string;
	datePattern: string;
	maxFiles: number;
	/** Size before rotation, with a k/m/g unit. */
	maxSize: string;
}

export interface ConsoleTransportConfig extends TransportConfigBase {
	type: "console";
}

export type TransportConfig = FileTransportConfig | ConsoleTransportConfig;

export interface LoggingConfig {
	/** When false a silent logger is returned. */
	enabled: boolean;
	level: LogLevel;
	transports: Array<TransportConfig>;
	/**
	 * Per-module level overrides keyed by file name without extension,
	 * parsed from "Module1:debug,Module2:warn".
	 */
	moduleOverrides: Record<string, LogLevel>;
}

/**
 * Extra fields merged into every log line, e.g. the active tenant id.
 */
export type LogMixin = () => Record<string, unknown>;

const transports = new Map<LogStreamType, DestinationStream>();

function getTransport(transportConfig: TransportConfig): DestinationStream {
	const cached = transports.get(transportConfig.type);
	if (cached) {
		return cached;
	}

	let stream: DestinationStream;
	if (transportConfig.type === "file") {
		const { datePattern, filenamePrefix, fileDirectoryPath, maxFiles, maxSize, level } = transportConfig;
		stream = pino.transport({
			targets: [
				{
					target: "pino-roll",
					level,
					options: {
						file: `${fileDirectoryPath}/${filenamePrefix}`,
						frequency: "daily",
						size: maxSize,
						dateFormat: datePattern,
						extension: ".log",
						mkdir: true,
						limit: { count: maxFiles },
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

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && LOG_LEVELS.some(level => level === value);
}

/** Module name for a file URL or path: the file name without its extension. */
export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const fileName = moduleUrl.substring(moduleUrl.lastIndexOf("/") + 1);
	const dot = fileName.indexOf(".");
	return dot > 0 ? fileName.substring(0, dot) : fileName;
}

/**
 * Builds a logging configuration. Unknown transport names and invalid
 * override levels are dropped.
 */
export function createLoggingConfig(options: {
	enabled: boolean;
	level: LogLevel;
	pretty: boolean;
	transportNames: string;
	moduleOverrides: string;
	filenamePrefix: string;
	fileDirectoryPath: string;
	datePattern?: string;
	maxFiles?: number;
	maxSize?: string;
}): LoggingConfig {
	const { enabled, level, pretty, filenamePrefix, fileDirectoryPath } = options;
	const transportConfigs: Array<TransportConfig> = [];
	for (const name of options.transportNames.split(",").map(t => t.trim())) {
		if (name === "file") {
			transportConfigs.push({
				type: "file",
				level,
				pretty,
				filenamePrefix,
				fileDirectoryPath,
				datePattern: options.datePattern ?? "yyyy-MM-dd",
				maxFiles: options.maxFiles ?? 14,
				maxSize: options.maxSize ?? "500m",
			});
		} else if (name === "console") {
			transportConfigs.push({ type: "console", level, pretty });
		}
	}

	const moduleOverrides: Record<string, LogLevel> = {};
	for (const pair of options.moduleOverrides.split(",")) {
		const [module, moduleLevel] = pair.split(":").map(part => part.trim());
		if (module && isLogLevel(moduleLevel)) {
			moduleOverrides[module] = moduleLevel;
		}
	}

	return { enabled, level, transports: transportConfigs, moduleOverrides };
}

/**
 * Reads logging settings from the environment:
 * DISABLE_LOGGING, LOG_LEVEL, LOG_PRETTY, LOG_TRANSPORTS, LOG_LEVEL_OVERRIDES,
 * LOG_FILE_NAME_PREFIX, LOG_FILE_DIRECTORY_PATH, LOG_FILE_DATE_PATTERN, LOG_FILE_MAX_FILES.
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
	const isDevelopment = env.NODE_ENV === "development";
	const level = env.LOG_LEVEL;
	return createLoggingConfig({
		enabled: env.DISABLE_LOGGING !== "true",
		level: isLogLevel(level) ? level : "info",
		pretty: (env.LOG_PRETTY ?? (isDevelopment ? "true" : "false")) === "true",
		transportNames: env.LOG_TRANSPORTS ?? "console",
		moduleOverrides: env.LOG_LEVEL_OVERRIDES ?? "",
		filenamePrefix: env.LOG_FILE_NAME_PREFIX ?? "storefront",
		fileDirectoryPath: env.LOG_FILE_DIRECTORY_PATH ?? "./logs",
		datePattern: env.LOG_FILE_DATE_PATTERN,
		maxFiles: env.LOG_FILE_MAX_FILES ? Number(env.LOG_FILE_MAX_FILES) : undefined,
	});
}

function createBaseLogger(config: LoggingConfig, mixin: LogMixin | undefined): PinoLogger {
	const streams: Array<StreamEntry> = config.transports.map(transportConfig => ({
		level: config.level,
		stream: getTransport(transportConfig),
	}));
	const options = { level: config.level, mixin };
	if (streams.length > 1) {
		return pino(options, pino.multistream(streams));
	}
	if (streams.length === 1) {
		return pino(options, streams[0].stream);
	}
	return pino(options);
}

// The more verbose of two levels
function getMinimumLevel(level1: LogLevel, level2: LogLevel): LogLevel {
	const { values } = pino.levels;
	return values[level1] < values[level2] ? level1 : level2;
}

export type Logger = PinoLogger;

let silentLogger: Logger | undefined;

export interface CreateLogOptions {
	configProvider?: () => LoggingConfig;
	loggerProvider?: (config: LoggingConfig, mixin: LogMixin | undefined) => PinoLogger;
	mixin?: LogMixin;
}

/**
 * Get a logger for a module. Call `createLog(import.meta)` near the top of
 * the file; the module name is taken from the file name.
 */
export function createLog(module: string | ImportMeta, options: CreateLogOptions = {}): Logger {
	const config = (options.configProvider ?? getLoggingConfig)();
	if (!config.enabled) {
		if (!silentLogger) {
			silentLogger = pino({ level: "silent" });
		}
		return silentLogger;
	}

	const moduleName = getModuleName(module);
	const moduleLevel = config.moduleOverrides[moduleName] ?? config.level;
	// The parent must be at least as verbose as the child or the child's lines are dropped.
	const parentLevel = getMinimumLevel(moduleLevel, config.level);
	const parent = (options.loggerProvider ?? createBaseLogger)(
		{
			...config,
			level: parentLevel,
			transports: config.transports.map(t => ({ ...t, level: parentLevel })),
		},
		options.mixin,
	);
	return parent.child({ module: moduleName }, { level: moduleLevel });
}
