/**
 * Logger module: structured application logging
 *
 * Provides a preconfigured Winston logger used across the project.
 * It writes plain-text logs to files and colorized human-readable logs
 * to the console (console output is disabled during tests).
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `info`), disabled when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * Usage
 * ```ts
 * import logger from './logger.js';
 *
 * logger.info('Simulation started with %d units', 2);
 * logger.debug('Unit changed activity', { unit: 'Alice', activity: 'walking' });
 * ```
 *
 * Notes
 * - `LOG_DIR` overrides the log directory (default `./logs` under the
 *   working directory).
 *
 * @module logger
 */
import winston from "winston";
import path from "path";

// node --test sets this in every test process
const isTestMode = process.env.NODE_TEST_CONTEXT;

// Generate timestamp for log filenames (YYYY-MM-DD-HHMMSS)
const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";

const LOG_DIRECTORY = process.env.LOG_DIR || path.join(process.cwd(), "logs");

const filePrintf = winston.format.printf(
	({ timestamp, level, message, ...meta }) =>
		`[${timestamp}] ${level.toUpperCase()}: ${message}${
			Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
		}`
);

const logger = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "cubeworld" },
	transports: [
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `error-${date}-${HMS}${testSuffix}.log`),
			level: "error",
			format: winston.format.combine(
				winston.format.uncolorize(),
				winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
				filePrintf
			),
		}),
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: winston.format.combine(
				winston.format.uncolorize(),
				winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
				filePrintf
			),
		}),
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, service, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

export default logger;
