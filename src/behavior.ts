/**
 * Idle behavior for units.
 *
 * A unit that is idle, has no destination and has auto behavior enabled
 * asks its injected {@link IdleBehavior} what to do next. No behavior is
 * injected by default, so idle units stay idle.
 *
 * @module behavior
 */

import type { RandomSource } from "./core/random.js";
import type { Unit } from "./core/unit.js";
import { isUnitError } from "./core/errors.js";
import logger from "./logger.js";

/**
 * Strategy consulted by an idle unit once per tick.
 */
export interface IdleBehavior {
	act(unit: Unit, random: RandomSource): void;
}

/**
 * Actions {@link RandomIdleBehavior} chooses between, with equal weight.
 */
export enum IDLE_ACTION {
	WANDER = 0,
	WORK = 1,
	REST = 2,
}

const IDLE_ACTION_COUNT = 3;

/**
 * Picks one of wander, work or rest uniformly at random.
 * Wandering walks toward a random cell of the unit's world.
 *
 * @example
 * ```typescript
 * const unit = new Unit({
 *   position: { x: 3, y: 3, z: 0 },
 *   name: "Wanderer",
 *   weight: 50, strength: 50, agility: 50, toughness: 50,
 *   autoBehavior: true,
 *   idleBehavior: new RandomIdleBehavior(),
 * });
 * ```
 */
export class RandomIdleBehavior implements IdleBehavior {
	public act(unit: Unit, random: RandomSource): void {
		const action = random.nextInt(IDLE_ACTION_COUNT);
		switch (action) {
			case IDLE_ACTION.WANDER:
				this.wander(unit, random);
				break;
			case IDLE_ACTION.WORK:
				unit.startWork();
				break;
			default:
				unit.startRest();
				break;
		}
	}

	private wander(unit: Unit, random: RandomSource): void {
		const size = unit.boundary.size;
		const x = random.nextInt(size);
		const y = random.nextInt(size);
		const z = random.nextInt(size);
		try {
			unit.moveTo(x, y, z);
		} catch (error) {
			if (!isUnitError(error)) throw error;
			logger.debug(`${unit.name} could not wander to (${x}, ${y}, ${z})`, {
				reason: error.message,
			});
		}
	}
}
