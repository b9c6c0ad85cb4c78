import winston from 'winston';
import chalk, { type ChalkInstance } from 'chalk';
import { LOG_LEVELS, isLogLevel, readEnv, type LogLevel } from '../env.js';
import { stringifyThrown } from '../errors/profile-errors.js';

// ===== 1. Foundation Layer: Winston Configuration =====

const logLevels: Record<LogLevel, number> = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	http: 3,
	verbose: 4,
	debug: 5,
	silly: 6, // Lowest priority
};

// ===== 2. Visual Formatting Layer =====

const colorMap = {
	red: chalk.red,
	green: chalk.green,
	yellow: chalk.yellow,
	blue: chalk.blue,
	magenta: chalk.magenta,
	cyan: chalk.cyan,
	white: chalk.white,
	gray: chalk.gray,
} satisfies Record<string, ChalkInstance>;

type ChalkColor = keyof typeof colorMap;

const levelColorMap: Record<LogLevel, ChalkInstance> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

const isChalkColor = (value: unknown): value is ChalkColor =>
	typeof value === 'string' && Object.prototype.hasOwnProperty.call(colorMap, value);

export interface LogLine {
	level: string;
	message: unknown;
	[key: string]: unknown;
}

const formatMetaValue = (value: unknown): string => {
	if (typeof value === 'string') {
		return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
	}
	try {
		return JSON.stringify(value) ?? stringifyThrown(value);
	} catch {
		return stringifyThrown(value);
	}
};

/**
 * Render one console line: timestamp, level, message, then meta as key=value
 */
export const renderLogLine = ({ level, message, timestamp, color, ...meta }: LogLine): string => {
	const colorize = isLogLevel(level) ? levelColorMap[level] : chalk.white;
	const text = String(message);
	const formattedMessage = isChalkColor(color) ? colorMap[color](text) : text;
	const fields = Object.entries(meta)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${formatMetaValue(value)}`);
	const suffix = fields.length > 0 ? ` ${chalk.dim(fields.join(' '))}` : '';

	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${formattedMessage}${suffix}`;
};

// Console formatting
const consoleFormat = winston.format.printf(info => renderLogLine(info));

// ===== 3. Configuration Layer =====

const getDefaultLogLevel = (): LogLevel => readEnv().PROFILES_LOG_LEVEL;

// ===== 4. Logger Options Interface =====

export interface LoggerOptions {
	level?: LogLevel;
	silent?: boolean;
}

export type LogMeta = Record<string, unknown>;

// ===== 5. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private isSilent: boolean = false;

	constructor(options: LoggerOptions = {}) {
		const level = options.level || getDefaultLogLevel();
		this.isSilent = options.silent || false;

		this.logger = winston.createLogger({
			levels: logLevels,
			level: level,
			transports: [
				new winston.transports.Console({
					format: winston.format.combine(
						winston.format.timestamp({ format: 'HH:mm:ss' }),
						consoleFormat
					),
					stderrLevels: [...LOG_LEVELS], // Redirect all log levels to stderr
				}),
			],
			silent: this.isSilent,
		});
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.error(message, { ...meta, color });
	}

	warn(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.warn(message, { ...meta, color });
	}

	info(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.info(message, { ...meta, color });
	}

	http(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.http(message, { ...meta, color });
	}

	verbose(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.verbose(message, { ...meta, color });
	}

	debug(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.debug(message, { ...meta, color });
	}

	silly(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.silly(message, { ...meta, color });
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${LOG_LEVELS.join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}

	setSilent(silent: boolean): void {
		this.isSilent = silent;
		this.logger.silent = silent;
	}

	isSilentMode(): boolean {
		return this.isSilent;
	}

	// ===== Utility Methods =====

	createChild(options: LoggerOptions = {}): Logger {
		const level = options.level ?? this.getLevel();
		return new Logger({
			level: isLogLevel(level) ? level : undefined,
			silent: options.silent !== undefined ? options.silent : this.isSilent,
		});
	}

	// Get logger instance for advanced usage
	getWinstonLogger(): winston.Logger {
		return this.logger;
	}
}

// ===== 6. Singleton Pattern =====

export const logger = new Logger();

// ===== Export Types =====

export type { ChalkColor };

// ===== Utility Functions =====

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};

export const getGlobalLogLevel = (): string => {
	return logger.getLevel();
};
