/**
 * Error types raised by unit commands and constructors.
 *
 * Explicit commands throw these to the caller. Internal re-derivations
 * (path stepping, idle behavior) catch them with {@link isUnitError} and
 * log instead, so a bad intermediate step never aborts a tick.
 *
 * @module core/errors
 */

/**
 * Base class for every error the unit model raises on purpose.
 */
export class UnitError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** A position (or computed goal) lies outside the world. */
export class InvalidPositionError extends UnitError {}

/** A name fails {@link isValidName}. */
export class InvalidNameError extends UnitError {}

/** A numeric argument is outside its accepted range. */
export class InvalidArgumentError extends UnitError {}

export function isUnitError(error: unknown): error is UnitError {
	return error instanceof UnitError;
}
