export {
	Logger,
	logger,
	createLogger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	renderLogLine,
	type LoggerOptions,
	type LogMeta,
	type LogLine,
	type ChalkColor,
} from './logger.js';
