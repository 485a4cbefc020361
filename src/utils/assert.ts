/**
 * Extended assertion utilities for numeric and vector comparisons.
 * Provides detailed error messages similar to assert.equal.
 *
 * @module utils/assert
 */

import assert from "node:assert";
import type { Coordinates } from "../core/vector.js";

/**
 * Default tolerance for {@link closeTo} and {@link vectorCloseTo}.
 */
export const DEFAULT_TOLERANCE = 1e-9;

/**
 * Asserts that actual is within `tolerance` of expected.
 *
 * @example
 * ```typescript
 * closeTo(0.1 + 0.2, 0.3); // Passes
 * closeTo(1, 2); // Throws: "1 is not within 1e-9 of 2"
 * ```
 */
export function closeTo(
	actual: number,
	expected: number,
	tolerance: number = DEFAULT_TOLERANCE,
	message?: string
): void {
	if (Math.abs(actual - expected) <= tolerance) {
		return;
	}
	const defaultMessage = `${actual} is not within ${tolerance} of ${expected}`;
	throw new assert.AssertionError({
		message: message || defaultMessage,
		actual,
		expected,
		operator: "closeTo",
		stackStartFn: closeTo,
	});
}

/**
 * Asserts that every component of actual is within `tolerance` of expected.
 */
export function vectorCloseTo(
	actual: Coordinates,
	expected: Coordinates,
	tolerance: number = DEFAULT_TOLERANCE,
	message?: string
): void {
	if (
		Math.abs(actual.x - expected.x) <= tolerance &&
		Math.abs(actual.y - expected.y) <= tolerance &&
		Math.abs(actual.z - expected.z) <= tolerance
	) {
		return;
	}
	const show = (v: Coordinates) => `(${v.x}, ${v.y}, ${v.z})`;
	const defaultMessage = `${show(actual)} is not within ${tolerance} of ${show(expected)}`;
	throw new assert.AssertionError({
		message: message || defaultMessage,
		actual: show(actual),
		expected: show(expected),
		operator: "vectorCloseTo",
		stackStartFn: vectorCloseTo,
	});
}

/**
 * Asserts that actual is greater than or equal to expected.
 *
 * @example
 * ```typescript
 * greaterThanOrEqual(10, 10); // Passes
 * greaterThanOrEqual(5, 10); // Throws: "5 is not greater than or equal to 10"
 * ```
 */
export function greaterThanOrEqual(
	actual: number,
	expected: number,
	message?: string
): void {
	if (actual >= expected) {
		return;
	}
	const defaultMessage = `${actual} is not greater than or equal to ${expected}`;
	throw new assert.AssertionError({
		message: message || defaultMessage,
		actual,
		expected: `>= ${expected}`,
		operator: ">=",
		stackStartFn: greaterThanOrEqual,
	});
}

/**
 * Asserts that actual is less than or equal to expected.
 *
 * @example
 * ```typescript
 * lessThanOrEqual(5, 10); // Passes
 * lessThanOrEqual(10, 5); // Throws: "10 is not less than or equal to 5"
 * ```
 */
export function lessThanOrEqual(
	actual: number,
	expected: number,
	message?: string
): void {
	if (actual <= expected) {
		return;
	}
	const defaultMessage = `${actual} is not less than or equal to ${expected}`;
	throw new assert.AssertionError({
		message: message || defaultMessage,
		actual,
		expected: `<= ${expected}`,
		operator: "<=",
		stackStartFn: lessThanOrEqual,
	});
}
