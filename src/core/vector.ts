/**
 * Immutable three-dimensional vector.
 *
 * Positions, goals and velocities are all Vector3 values. Every operation
 * returns a new vector, so a vector handed out by a getter can never be
 * used to move a unit behind its back.
 *
 * @example
 * ```typescript
 * import { Vector3 } from "./vector.js";
 *
 * const a = new Vector3(1, 2, 2);
 * a.length(); // 3
 * a.add(new Vector3(1, 0, 0)); // Vector3(2, 2, 2)
 * a.normalize(); // Vector3(1/3, 2/3, 2/3)
 * ```
 *
 * @module core/vector
 */

/**
 * Plain coordinate triple, accepted anywhere a position can be given.
 */
export interface Coordinates {
	x: number;
	y: number;
	z: number;
}

/**
 * Default tolerance for {@link Vector3.isAlmostEqual}.
 */
export const VECTOR_EPSILON = 1e-4;

export class Vector3 implements Coordinates {
	public static readonly ZERO = new Vector3(0, 0, 0);

	public readonly x: number;
	public readonly y: number;
	public readonly z: number;

	constructor(x: number, y: number, z: number) {
		this.x = x;
		this.y = y;
		this.z = z;
		Object.freeze(this);
	}

	/**
	 * Builds a vector from any object with x, y and z.
	 * Returns the argument itself when it already is a Vector3.
	 */
	public static from(coordinates: Coordinates): Vector3 {
		if (coordinates instanceof Vector3) return coordinates;
		return new Vector3(coordinates.x, coordinates.y, coordinates.z);
	}

	public add(other: Coordinates): Vector3 {
		return new Vector3(this.x + other.x, this.y + other.y, this.z + other.z);
	}

	public subtract(other: Coordinates): Vector3 {
		return new Vector3(this.x - other.x, this.y - other.y, this.z - other.z);
	}

	public scale(factor: number): Vector3 {
		return new Vector3(this.x * factor, this.y * factor, this.z * factor);
	}

	public length(): number {
		return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z);
	}

	/**
	 * Returns the unit vector pointing the same way.
	 * The zero vector has no direction and is returned unchanged.
	 */
	public normalize(): Vector3 {
		const length = this.length();
		if (length === 0) return this;
		return this.scale(1 / length);
	}

	public distanceTo(other: Coordinates): number {
		return this.subtract(other).length();
	}

	/**
	 * Floors every component, giving the integer cell this point lies in.
	 */
	public floor(): Vector3 {
		return new Vector3(Math.floor(this.x), Math.floor(this.y), Math.floor(this.z));
	}

	/**
	 * Centre of the cell this point lies in.
	 */
	public cellCenter(): Vector3 {
		return this.floor().add(CELL_HALF);
	}

	/**
	 * True when both points lie in the same grid cell.
	 */
	public sameCell(other: Coordinates): boolean {
		return (
			Math.floor(this.x) === Math.floor(other.x) &&
			Math.floor(this.y) === Math.floor(other.y) &&
			Math.floor(this.z) === Math.floor(other.z)
		);
	}

	/**
	 * Component-wise comparison within `epsilon`.
	 */
	public isAlmostEqual(other: Coordinates, epsilon = VECTOR_EPSILON): boolean {
		return (
			Math.abs(this.x - other.x) <= epsilon &&
			Math.abs(this.y - other.y) <= epsilon &&
			Math.abs(this.z - other.z) <= epsilon
		);
	}

	public equals(other: Coordinates): boolean {
		return this.x === other.x && this.y === other.y && this.z === other.z;
	}

	public toJSON(): Coordinates {
		return { x: this.x, y: this.y, z: this.z };
	}

	public toString(): string {
		return `(${this.x}, ${this.y}, ${this.z})`;
	}
}

const CELL_HALF = new Vector3(0.5, 0.5, 0.5);
