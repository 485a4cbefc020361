/**
 * Run a short demonstration simulation
 *
 * Loads `data/config.yaml`, spawns two units next to each other, lets one
 * attack the other and sends the second across the world, then plays the
 * configured duration and logs where everyone ended up.
 *
 * Usage: `npm run simulate`
 */

import logger from "../logger.js";
import { loadConfig } from "../package/config.js";
import { CONFIG } from "../registry/config.js";
import { CubeBoundary } from "../core/boundary.js";
import { SeededRandomSource } from "../core/random.js";
import { Unit } from "../core/unit.js";
import { RandomIdleBehavior } from "../behavior.js";
import { runSimulation } from "../simulation.js";

try {
	await loadConfig();

	const boundary = new CubeBoundary(CONFIG.world.size);
	const random = new SeededRandomSource(CONFIG.simulation.seed);
	const idleBehavior = new RandomIdleBehavior();
	const shared = {
		weight: 50,
		strength: 50,
		agility: 50,
		toughness: 50,
		autoBehavior: CONFIG.unit.auto_behavior,
		boundary,
		random,
		idleBehavior,
	};

	const alice = new Unit({ ...shared, position: { x: 0, y: 0, z: 0 }, name: "Alice" });
	const bob = new Unit({ ...shared, position: { x: 1, y: 0, z: 0 }, name: "Bob" });

	const outcome = alice.attack(bob);
	logger.info(`Alice attacks Bob: ${outcome ?? "out of reach"}`);
	bob.moveTo(boundary.size - 1, boundary.size - 1, 0);

	const result = runSimulation(
		[alice, bob],
		CONFIG.simulation.tick,
		CONFIG.simulation.duration
	);
	for (const unit of result.units) {
		logger.info(`${unit.name} ended ${unit.activity}`, unit);
	}
} catch (error) {
	logger.error(`Simulation failed: ${error}`);
	process.exitCode = 1;
}
