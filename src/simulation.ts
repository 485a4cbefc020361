/**
 * Fixed-step driver for a handful of units.
 *
 * Advances every unit once per tick, in the order given, and logs a
 * snapshot of each unit once per simulated second. It makes no promises
 * about simultaneity; it exists to exercise the unit model end to end.
 *
 * @module simulation
 */
import logger from "./logger.js";
import { InvalidArgumentError } from "./core/errors.js";
import type { Coordinates } from "./core/vector.js";
import { ACTIVITY, MAX_TICK, type Unit } from "./core/unit.js";

export interface UnitSnapshot {
	name: string;
	activity: ACTIVITY;
	position: Coordinates;
	health: number;
	stamina: number;
}

export interface SimulationResult {
	/** Number of ticks played. */
	ticks: number;
	/** Simulated seconds played. */
	elapsed: number;
	units: UnitSnapshot[];
}

export function snapshotUnit(unit: Unit): UnitSnapshot {
	return {
		name: unit.name,
		activity: unit.activity,
		position: unit.position.toJSON(),
		health: unit.health,
		stamina: unit.stamina,
	};
}

/**
 * Plays `duration` seconds in steps of `tick`.
 *
 * @throws {InvalidArgumentError} `tick` is not in (0, 0.2] or `duration` is negative
 */
export function runSimulation(
	units: ReadonlyArray<Unit>,
	tick: number,
	duration: number
): SimulationResult {
	if (!(tick > 0 && tick <= MAX_TICK)) {
		throw new InvalidArgumentError(`Tick must lie in (0, ${MAX_TICK}], got ${tick}`);
	}
	if (!(duration >= 0)) {
		throw new InvalidArgumentError(`Duration must not be negative, got ${duration}`);
	}

	const ticks = Math.round(duration / tick);
	const ticksPerSecond = Math.max(1, Math.round(1 / tick));
	logger.info(`Simulating ${units.length} units for ${ticks} ticks`);
	for (let i = 1; i <= ticks; i++) {
		for (const unit of units) unit.advance(tick);
		if (i % ticksPerSecond === 0) {
			logger.debug(`t=${(i * tick).toFixed(1)}s`, {
				units: units.map(snapshotUnit),
			});
		}
	}

	return {
		ticks,
		elapsed: ticks * tick,
		units: units.map(snapshotUnit),
	};
}
