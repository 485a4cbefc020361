/**
 * Rest recovery for units.
 *
 * A resting unit heals first and only recovers stamina once its health is
 * full. Rates scale with toughness:
 * - health:  toughness / 40 per second
 * - stamina: toughness / 20 per second
 *
 * @module systems/regeneration
 */

export const HEALTH_RECOVERY_DIVISOR = 40;
export const STAMINA_RECOVERY_DIVISOR = 20;

/**
 * Resource values a recovery step reads and produces.
 */
export interface ResourceSnapshot {
	health: number;
	maxHealth: number;
	stamina: number;
	maxStamina: number;
}

export type RecoveredResource = "health" | "stamina";

export interface RecoveryResult {
	health: number;
	stamina: number;
	/** Which resource grew this step; undefined when both were full. */
	recovered?: RecoveredResource;
}

/**
 * Applies one recovery step of `dt` seconds.
 *
 * @example
 * ```typescript
 * restRecovery({ health: 45, maxHealth: 50, stamina: 10, maxStamina: 50 }, 50, 0.2);
 * // { health: 45.25, stamina: 10, recovered: "health" }
 * ```
 */
export function restRecovery(
	resources: ResourceSnapshot,
	toughness: number,
	dt: number
): RecoveryResult {
	const { health, maxHealth, stamina, maxStamina } = resources;
	if (health < maxHealth) {
		const gain = (toughness / HEALTH_RECOVERY_DIVISOR) * dt;
		return {
			health: Math.min(maxHealth, health + gain),
			stamina,
			recovered: "health",
		};
	}
	if (stamina < maxStamina) {
		const gain = (toughness / STAMINA_RECOVERY_DIVISOR) * dt;
		return {
			health,
			stamina: Math.min(maxStamina, stamina + gain),
			recovered: "stamina",
		};
	}
	return { health, stamina };
}
