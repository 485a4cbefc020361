import { test, suite } from "node:test";
import assert from "node:assert";
import {
	InvalidArgumentError,
	InvalidNameError,
	InvalidPositionError,
	UnitError,
	isUnitError,
} from "./errors.js";

suite("core/errors.ts", () => {
	test("should name errors after their class", () => {
		assert.strictEqual(new InvalidPositionError("x").name, "InvalidPositionError");
		assert.strictEqual(new InvalidNameError("x").name, "InvalidNameError");
		assert.strictEqual(new InvalidArgumentError("x").name, "InvalidArgumentError");
	});

	test("should share the UnitError base", () => {
		const error = new InvalidArgumentError("bad tick");
		assert.ok(error instanceof UnitError);
		assert.ok(error instanceof Error);
		assert.strictEqual(error.message, "bad tick");
	});

	test("isUnitError should only accept unit errors", () => {
		assert.ok(isUnitError(new InvalidNameError("x")));
		assert.ok(!isUnitError(new RangeError("x")));
		assert.ok(!isUnitError("x"));
	});
});
