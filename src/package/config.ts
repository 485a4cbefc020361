/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with the defaults if missing) and
 * installs the result as the registry's `CONFIG`.
 *
 * Behavior
 * - Reads YAML from `data/config.yaml` (or the path given)
 * - Takes only known keys of known sections; unknown keys are ignored
 * - Values of the wrong type keep their default and log a warning
 * - If the file does not exist, writes `CONFIG_DEFAULT` to disk
 *
 * @example
 * import { loadConfig } from './package/config.js';
 * import { CONFIG } from './registry/config.js';
 * await loadConfig();
 * console.log(CONFIG.world.size);
 *
 * @module package/config
 */
import { dirname, join, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { CONFIG_DEFAULT, setConfig, type Config } from "../registry/config.js";

export const DATA_DIRECTORY = join(process.cwd(), "data");
export const CONFIG_PATH = join(DATA_DIRECTORY, "config.yaml");

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function readNumber(
	section: Section | undefined,
	path: string,
	key: string,
	fallback: number
): number {
	if (!section || !(key in section)) return fallback;
	const value = section[key];
	if (typeof value !== "number" || !Number.isFinite(value)) {
		logger.warn(`Ignoring ${path}.${key}: expected a number`, { value });
		return fallback;
	}
	if (value === fallback) logger.debug(`DEFAULT ${path}.${key} = ${value}`);
	else logger.debug(`Set ${path}.${key} = ${value}`);
	return value;
}

function readBoolean(
	section: Section | undefined,
	path: string,
	key: string,
	fallback: boolean
): boolean {
	if (!section || !(key in section)) return fallback;
	const value = section[key];
	if (typeof value !== "boolean") {
		logger.warn(`Ignoring ${path}.${key}: expected a boolean`, { value });
		return fallback;
	}
	if (value === fallback) logger.debug(`DEFAULT ${path}.${key} = ${value}`);
	else logger.debug(`Set ${path}.${key} = ${value}`);
	return value;
}

function sectionOf(parsed: unknown, name: keyof Config): Section | undefined {
	if (!isSection(parsed)) return undefined;
	const section = parsed[name];
	return isSection(section) ? section : undefined;
}

/**
 * Builds a full config from parsed YAML, falling back to the defaults.
 */
export function mergeConfig(parsed: unknown): Config {
	const world = sectionOf(parsed, "world");
	const simulation = sectionOf(parsed, "simulation");
	const unit = sectionOf(parsed, "unit");
	return {
		world: {
			size: readNumber(world, "world", "size", CONFIG_DEFAULT.world.size),
		},
		simulation: {
			tick: readNumber(simulation, "simulation", "tick", CONFIG_DEFAULT.simulation.tick),
			duration: readNumber(
				simulation,
				"simulation",
				"duration",
				CONFIG_DEFAULT.simulation.duration
			),
			seed: readNumber(simulation, "simulation", "seed", CONFIG_DEFAULT.simulation.seed),
		},
		unit: {
			auto_behavior: readBoolean(
				unit,
				"unit",
				"auto_behavior",
				CONFIG_DEFAULT.unit.auto_behavior
			),
		},
	};
}

async function writeDefaultConfig(path: string) {
	const defaultContent = YAML.dump(CONFIG_DEFAULT, {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		// Write to temporary file first
		await writeFile(tempPath, defaultContent, "utf-8");
		// Atomically rename temp file to final location
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) =>
			logger.debug(`Could not remove ${tempPath}`, { cleanupError })
		);
		throw writeError;
	}
}

/**
 * Reads the config file at `path` into the registry.
 * A missing file is replaced by the defaults; a malformed one throws.
 */
export async function loadConfig(path: string = CONFIG_PATH) {
	logger.debug(`Loading config from ${relative(process.cwd(), path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (!isMissingFile(error)) throw error;
		logger.debug(`Config file not found, creating default at ${path}`);
		await writeDefaultConfig(path);
		setConfig(CONFIG_DEFAULT);
		return;
	}

	setConfig(mergeConfig(YAML.load(content)));
	logger.info("Config loaded successfully");
}
