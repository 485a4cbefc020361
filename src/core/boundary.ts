/**
 * World boundary policies.
 *
 * A unit only needs to know whether a point lies inside the world. The
 * default world is the axis-aligned cube [0, 50) on every axis; other
 * sizes can be injected through {@link CubeBoundary}.
 *
 * @module core/boundary
 */

import type { Coordinates } from "./vector.js";
import { InvalidArgumentError } from "./errors.js";

/**
 * Edge length of the default cubic world, in cells.
 */
export const DEFAULT_WORLD_SIZE = 50;

/**
 * Predicate deciding which points belong to the world.
 */
export interface BoundaryPolicy {
	/** The number of cells along each axis. */
	readonly size: number;
	inWorld(position: Coordinates): boolean;
}

/**
 * Cubic world spanning [0, size) on all three axes.
 */
export class CubeBoundary implements BoundaryPolicy {
	public readonly size: number;

	constructor(size: number = DEFAULT_WORLD_SIZE) {
		if (!Number.isInteger(size) || size < 1) {
			throw new InvalidArgumentError(`World size must be a positive integer, got ${size}`);
		}
		this.size = size;
	}

	public inWorld(position: Coordinates): boolean {
		return (
			inRange(position.x, this.size) &&
			inRange(position.y, this.size) &&
			inRange(position.z, this.size)
		);
	}
}

function inRange(value: number, size: number): boolean {
	return value >= 0 && value < size;
}

/**
 * Shared instance of the default 50-cell world.
 */
export const DEFAULT_BOUNDARY: BoundaryPolicy = new CubeBoundary();

/**
 * True iff every coordinate lies in [0, 50).
 *
 * @example
 * ```typescript
 * isValidPosition(new Vector3(13, 14, 15)); // true
 * isValidPosition(new Vector3(60, 14, 15)); // false
 * isValidPosition(new Vector3(50, 0, 0)); // false
 * ```
 */
export function isValidPosition(position: Coordinates): boolean {
	return DEFAULT_BOUNDARY.inWorld(position);
}
