/**
 * Unit name validation.
 *
 * A valid name is at least two characters long, starts with an uppercase
 * ASCII letter and uses only ASCII letters, spaces, single quotes and
 * double quotes.
 *
 * @module core/name
 */

export const MINIMUM_NAME_LENGTH = 2;

const NAME_PATTERN = /^[A-Z][A-Za-z '"]*$/;

/**
 * @example
 * ```typescript
 * isValidName("Lucifer"); // true
 * isValidName("H"); // false, too short
 * isValidName("schaap"); // false, lowercase first letter
 * isValidName("O'Neil \"Red\""); // true
 * ```
 */
export function isValidName(name: string): boolean {
	if (name.length < MINIMUM_NAME_LENGTH) return false;
	return NAME_PATTERN.test(name);
}
