export { Vector3, VECTOR_EPSILON, type Coordinates } from "./src/core/vector.js";
export {
	CubeBoundary,
	DEFAULT_BOUNDARY,
	DEFAULT_WORLD_SIZE,
	isValidPosition,
	type BoundaryPolicy,
} from "./src/core/boundary.js";
export {
	MathRandomSource,
	SeededRandomSource,
	ScriptedRandomSource,
	type RandomSnapshot,
	type RandomSource,
} from "./src/core/random.js";
export {
	UnitError,
	InvalidArgumentError,
	InvalidNameError,
	InvalidPositionError,
	isUnitError,
} from "./src/core/errors.js";
export { isValidName } from "./src/core/name.js";
export {
	INITIAL_ATTRIBUTE_BOUNDS,
	RUNTIME_ATTRIBUTE_BOUNDS,
	type UnitAttributeSet,
} from "./src/core/attribute.js";
export { Unit, ACTIVITY, MAX_TICK, type UnitOptions } from "./src/core/unit.js";
export { DEFENSE_OUTCOME } from "./src/systems/combat.js";
export { RandomIdleBehavior, type IdleBehavior } from "./src/behavior.js";
export { runSimulation, snapshotUnit, type SimulationResult } from "./src/simulation.js";
