/**
 * Combat rules shared by attacking and defending units.
 *
 * Features:
 * - Reach check: attacker and victim must be less than 2 apart on every axis
 * - Three-way defense roll: dodge, then block, then hit
 * - Dodge target selection among the eight horizontal neighbours
 *
 * The functions here are pure apart from the random source they are given;
 * the unit applies the outcome to itself.
 *
 * @module systems/combat
 */
import type { BoundaryPolicy } from "../core/boundary.js";
import type { RandomSource } from "../core/random.js";
import { type Coordinates, Vector3 } from "../core/vector.js";

/**
 * Result of a single defense against an attack.
 */
export enum DEFENSE_OUTCOME {
	/** The defender stepped aside into a neighbouring cell. */
	DODGE = "dodge",
	/** The defender parried; nothing happens. */
	BLOCK = "block",
	/** The defender took damage. */
	HIT = "hit",
}

/**
 * Stats the combat formulas read from either side.
 */
export interface CombatStats {
	readonly strength: number;
	readonly agility: number;
}

/**
 * Seconds an attacker stays locked in its attack.
 */
export const ATTACK_LOCK_SECONDS = 1;

/**
 * Exclusive per-axis distance within which an attack lands.
 */
export const ATTACK_REACH = 2;

const DODGE_FACTOR = 0.2;
const BLOCK_FACTOR = 0.25;
const DAMAGE_DIVISOR = 10;

/**
 * The eight horizontal neighbour offsets, in x-major order.
 */
export const HORIZONTAL_OFFSETS: ReadonlyArray<Vector3> = Object.freeze(
	[-1, 0, 1].flatMap((dx) =>
		[-1, 0, 1]
			.filter((dy) => dx !== 0 || dy !== 0)
			.map((dy) => new Vector3(dx, dy, 0))
	)
);

export function isWithinReach(from: Coordinates, to: Coordinates): boolean {
	return (
		Math.abs(to.x - from.x) < ATTACK_REACH &&
		Math.abs(to.y - from.y) < ATTACK_REACH &&
		Math.abs(to.z - from.z) < ATTACK_REACH
	);
}

/**
 * Horizontal angle, in radians, of the direction from `from` to `to`.
 */
export function facing(from: Coordinates, to: Coordinates): number {
	return Math.atan2(to.y - from.y, to.x - from.x);
}

export function dodgeChance(defender: CombatStats, attacker: CombatStats): number {
	return (DODGE_FACTOR * defender.agility) / attacker.agility;
}

export function blockChance(defender: CombatStats, attacker: CombatStats): number {
	return (
		(BLOCK_FACTOR * (defender.strength + defender.agility)) /
		(attacker.strength + attacker.agility)
	);
}

export function hitDamage(attacker: CombatStats): number {
	return Math.floor(attacker.strength / DAMAGE_DIVISOR);
}

/**
 * Rolls the defense outcome. The dodge roll comes first; the block roll is
 * only drawn when the dodge fails.
 *
 * @example
 * ```typescript
 * // equal stats: dodge below 0.2, block below 0.25
 * rollDefense(a, b, random); // DEFENSE_OUTCOME.HIT when both rolls are 0.9
 * ```
 */
export function rollDefense(
	defender: CombatStats,
	attacker: CombatStats,
	random: RandomSource
): DEFENSE_OUTCOME {
	if (random.nextDouble() < dodgeChance(defender, attacker)) {
		return DEFENSE_OUTCOME.DODGE;
	}
	if (random.nextDouble() < blockChance(defender, attacker)) {
		return DEFENSE_OUTCOME.BLOCK;
	}
	return DEFENSE_OUTCOME.HIT;
}

/**
 * Picks a random in-world horizontal neighbour of `position`.
 *
 * @returns The new position, or undefined when no neighbour is in the world
 */
export function pickDodgeTarget(
	position: Vector3,
	boundary: BoundaryPolicy,
	random: RandomSource
): Vector3 | undefined {
	const candidates = HORIZONTAL_OFFSETS.map((offset) => position.add(offset)).filter(
		(candidate) => boundary.inWorld(candidate)
	);
	if (candidates.length === 0) return undefined;
	return candidates[random.nextInt(candidates.length)];
}
