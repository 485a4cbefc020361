/**
 * Registry: config - centralized configuration access
 *
 * Holds the simulation configuration. The CONFIG object is read-only for
 * consumers and replaced wholesale by the config package after loading
 * `data/config.yaml`.
 *
 * @module registry/config
 */

/**
 * Deep readonly utility type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = {
	readonly [P in keyof T]: T[P] extends object ? DeepReadonly<T[P]> : T[P];
};

export type WorldConfig = {
	/** Edge length of the cubic world, in cells. */
	size: number;
};

export type SimulationConfig = {
	/** Seconds advanced per tick; must lie in (0, 0.2]. */
	tick: number;
	/** Simulated seconds the runner plays. */
	duration: number;
	/** Seed for the runner's random source. */
	seed: number;
};

export type UnitConfig = {
	/** Whether units spawned by the runner pick idle actions on their own. */
	auto_behavior: boolean;
};

export type Config = {
	world: WorldConfig;
	simulation: SimulationConfig;
	unit: UnitConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = Object.freeze({
	world: Object.freeze({
		size: 50,
	}),
	simulation: Object.freeze({
		tick: 0.1,
		duration: 30,
		seed: 1,
	}),
	unit: Object.freeze({
		auto_behavior: false,
	}),
});

function copyDefaults(): Config {
	return {
		world: { ...CONFIG_DEFAULT.world },
		simulation: { ...CONFIG_DEFAULT.simulation },
		unit: { ...CONFIG_DEFAULT.unit },
	};
}

// make a copy of the default, don't reference it directly
const CONFIG: Config = copyDefaults();

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;
export { READONLY_CONFIG as CONFIG };

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: DeepReadonly<Config>) {
	CONFIG.world = { ...config.world };
	CONFIG.simulation = { ...config.simulation };
	CONFIG.unit = { ...config.unit };
}

/**
 * Restores every section to its default values.
 */
export function resetConfig() {
	setConfig(copyDefaults());
}
