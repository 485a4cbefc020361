import { test, suite } from "node:test";
import assert from "node:assert";
import { restRecovery } from "./regeneration.js";
import { closeTo } from "../utils/assert.js";

suite("systems/regeneration.ts", () => {
	test("should heal before recovering stamina", () => {
		const result = restRecovery(
			{ health: 45, maxHealth: 50, stamina: 10, maxStamina: 50 },
			50,
			0.2
		);
		closeTo(result.health, 45.25);
		assert.strictEqual(result.stamina, 10);
		assert.strictEqual(result.recovered, "health");
	});

	test("should recover stamina once health is full", () => {
		const result = restRecovery(
			{ health: 50, maxHealth: 50, stamina: 10, maxStamina: 50 },
			50,
			0.2
		);
		assert.strictEqual(result.health, 50);
		closeTo(result.stamina, 10.5);
		assert.strictEqual(result.recovered, "stamina");
	});

	test("should not overshoot the maximum", () => {
		const result = restRecovery(
			{ health: 49.9, maxHealth: 50, stamina: 50, maxStamina: 50 },
			200,
			0.2
		);
		assert.strictEqual(result.health, 50);
	});

	test("should report nothing when both are full", () => {
		const result = restRecovery(
			{ health: 50, maxHealth: 50, stamina: 50, maxStamina: 50 },
			50,
			0.2
		);
		assert.deepStrictEqual(result, { health: 50, stamina: 50 });
	});
});
