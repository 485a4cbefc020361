/**
 * Unit attributes and the capacities derived from them.
 *
 * Strength, agility, toughness and weight are whole numbers. A freshly
 * created unit has them clamped to the narrower initial bounds; later
 * changes use the wider runtime bounds. In both cases weight is raised to
 * at least half the sum of strength and agility.
 *
 * Derived values:
 * - maxHealth / maxStamina: `ceil(200 * weight/100 * toughness/100)`
 * - baseSpeed: `1.5 * (strength + agility) / (200 * weight/100)`
 *
 * @module attribute
 */

/**
 * The four primary attributes of a unit.
 */
export interface UnitAttributeSet {
	strength: number;
	agility: number;
	toughness: number;
	weight: number;
}

/**
 * Inclusive lower and upper bound for an attribute.
 */
export interface AttributeBounds {
	min: number;
	max: number;
}

/** Bounds applied once, when a unit is created. */
export const INITIAL_ATTRIBUTE_BOUNDS: Readonly<AttributeBounds> = Object.freeze({
	min: 25,
	max: 100,
});

/** Bounds applied to every later attribute change. */
export const RUNTIME_ATTRIBUTE_BOUNDS: Readonly<AttributeBounds> = Object.freeze({
	min: 1,
	max: 200,
});

/**
 * Clamps a number into [min, max]. Non-finite values become `min`.
 */
export function clampNumber(value: number, min: number, max: number): number {
	if (!Number.isFinite(value)) return min;
	return Math.min(Math.max(value, min), max);
}

function clampAttribute(value: number, bounds: AttributeBounds): number {
	return Math.trunc(clampNumber(value, bounds.min, bounds.max));
}

/**
 * The lowest weight a unit with this strength and agility may have.
 */
export function minimumWeight(strength: number, agility: number): number {
	return Math.floor((strength + agility) / 2);
}

/**
 * Brings an attribute set inside `bounds` and restores the weight relation.
 * Strength, agility and toughness are clamped first; weight is then raised
 * to {@link minimumWeight} when it falls short, or clamped otherwise.
 *
 * @example
 * ```typescript
 * normalizeAttributes(
 *   { strength: 150, agility: 10, toughness: 50, weight: 20 },
 *   INITIAL_ATTRIBUTE_BOUNDS
 * );
 * // { strength: 100, agility: 25, toughness: 50, weight: 62 }
 * ```
 */
export function normalizeAttributes(
	attributes: UnitAttributeSet,
	bounds: AttributeBounds
): UnitAttributeSet {
	const strength = clampAttribute(attributes.strength, bounds);
	const agility = clampAttribute(attributes.agility, bounds);
	const toughness = clampAttribute(attributes.toughness, bounds);
	const floor = minimumWeight(strength, agility);
	let weight = Math.trunc(
		Number.isFinite(attributes.weight) ? attributes.weight : bounds.min
	);
	if (weight < floor) weight = floor;
	else weight = clampAttribute(weight, bounds);
	return { strength, agility, toughness, weight };
}

/**
 * Maximum health and stamina share one formula.
 */
export function maxCapacity(weight: number, toughness: number): number {
	return Math.ceil((2 * weight * toughness) / 100);
}

export function baseSpeed(strength: number, agility: number, weight: number): number {
	return (1.5 * (strength + agility)) / ((200 * weight) / 100);
}
