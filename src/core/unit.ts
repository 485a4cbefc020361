/**
 * The unit: a single agent living in a cubic grid world.
 *
 * A unit owns continuous state (position, velocity, orientation) and one
 * discrete activity at a time. Commands such as {@link Unit.moveTo},
 * {@link Unit.attack} or {@link Unit.startWork} request a change of
 * activity; {@link Unit.advance} moves time forward and drives every timed
 * transition.
 *
 * Activity lock
 * - `activityTimer` is the time left during which the current activity may
 *   not be preempted by another voluntary command. Attacking locks for 1
 *   second, starting a rest for `40 / toughness` seconds. Negative or zero
 *   means unlocked.
 * - A forced rest (after 180 seconds without one) ignores the lock.
 *
 * Working keeps its own `workTimer`, so walking may interrupt it.
 *
 * @example
 * ```typescript
 * import { Unit, ACTIVITY } from "./unit.js";
 *
 * const unit = new Unit({
 *   position: { x: 10, y: 10, z: 10 },
 *   name: "Abraham",
 *   weight: 50,
 *   strength: 50,
 *   agility: 50,
 *   toughness: 50,
 * });
 * unit.moveTo(12, 10, 10);
 * while (unit.hasEndGoal) unit.advance(0.2);
 * unit.position; // Vector3(12.5, 10.5, 10.5)
 * ```
 *
 * @module core/unit
 */
import assert from "node:assert";
import logger from "../logger.js";
import type { IdleBehavior } from "../behavior.js";
import { type BoundaryPolicy, DEFAULT_BOUNDARY } from "./boundary.js";
import {
	InvalidArgumentError,
	InvalidNameError,
	InvalidPositionError,
	isUnitError,
} from "./errors.js";
import { isValidName } from "./name.js";
import { MathRandomSource, type RandomSource } from "./random.js";
import { type Coordinates, Vector3 } from "./vector.js";
import {
	INITIAL_ATTRIBUTE_BOUNDS,
	RUNTIME_ATTRIBUTE_BOUNDS,
	type UnitAttributeSet,
	baseSpeed,
	clampNumber,
	maxCapacity,
	normalizeAttributes,
} from "./attribute.js";
import {
	ATTACK_LOCK_SECONDS,
	DEFENSE_OUTCOME,
	facing,
	hitDamage,
	isWithinReach,
	pickDodgeTarget,
	rollDefense,
} from "../systems/combat.js";
import { restRecovery } from "../systems/regeneration.js";

/**
 * The activities a unit can be engaged in. Exactly one holds at a time.
 */
export enum ACTIVITY {
	IDLE = "idle",
	WALKING = "walking",
	ATTACKING = "attacking",
	/** Only held while an attack is being resolved. */
	DEFENDING = "defending",
	DANCING = "dancing",
	WORKING = "working",
	RESTING = "resting",
	/** Terminal: health ran out. The unit ignores every command. */
	INCAPACITATED = "incapacitated",
}

/** Longest tick {@link Unit.advance} accepts, in seconds. */
export const MAX_TICK = 0.2;
/** Seconds without rest after which a unit is forced to rest. */
export const FATIGUE_THRESHOLD = 180;
/** Stamina drained per second of sprinting. */
export const SPRINT_STAMINA_DRAIN = 0.1;
export const SPRINT_SPEED_FACTOR = 2;
export const CLIMB_SPEED_FACTOR = 0.5;
export const DESCEND_SPEED_FACTOR = 1.2;
/** Work takes `WORK_EFFORT / strength` seconds. */
export const WORK_EFFORT = 500;
/** A rest locks for at least `REST_EFFORT / toughness` seconds. */
export const REST_EFFORT = 40;

const INITIAL_ORIENTATION = Math.PI / 2;
const UNLOCKED = -1;

export interface UnitOptions {
	/** Cell coordinates; the unit is placed at the centre of that cell. */
	position: Coordinates;
	name: string;
	weight: number;
	strength: number;
	agility: number;
	toughness: number;
	autoBehavior?: boolean;
	/** Defaults to the 50-cell cube. */
	boundary?: BoundaryPolicy;
	/** Defaults to an unseeded {@link MathRandomSource}. */
	random?: RandomSource;
	/** Consulted when idle without a destination and auto behavior is on. */
	idleBehavior?: IdleBehavior;
}

export class Unit {
	public readonly boundary: BoundaryPolicy;
	public readonly random: RandomSource;
	public idleBehavior: IdleBehavior | undefined;
	public autoBehavior: boolean;

	/** Fixed at creation. */
	public readonly maxHealth: number;
	/** Fixed at creation. */
	public readonly maxStamina: number;

	private _name: string;
	private _attributes: UnitAttributeSet;
	private _health: number;
	private _stamina: number;

	private _position: Vector3;
	private _orientation = INITIAL_ORIENTATION;
	private _velocity: Vector3 = Vector3.ZERO;
	private _currentSpeed = 0;
	private _sprinting = false;

	private _start: Vector3;
	private _currentGoal: Vector3;
	private _endGoal: Vector3 | undefined;

	private _activity: ACTIVITY = ACTIVITY.IDLE;
	private _activityTimer = UNLOCKED;
	private _workTimer = 0;
	private _fatigueTimer = 0;
	private _mustRest = false;

	/**
	 * @throws {InvalidPositionError} The cell lies outside the boundary
	 * @throws {InvalidNameError} The name fails {@link isValidName}
	 */
	constructor(options: UnitOptions) {
		this.boundary = options.boundary ?? DEFAULT_BOUNDARY;
		this.random = options.random ?? new MathRandomSource();
		this.idleBehavior = options.idleBehavior;
		this.autoBehavior = options.autoBehavior ?? false;

		this._attributes = normalizeAttributes(
			{
				strength: options.strength,
				agility: options.agility,
				toughness: options.toughness,
				weight: options.weight,
			},
			INITIAL_ATTRIBUTE_BOUNDS
		);
		const { weight, toughness } = this._attributes;
		this.maxHealth = maxCapacity(weight, toughness);
		this.maxStamina = maxCapacity(weight, toughness);
		this._health = this.maxHealth;
		this._stamina = this.maxStamina;

		const position = Vector3.from(options.position).cellCenter();
		if (!this.boundary.inWorld(position)) {
			throw new InvalidPositionError(`Cannot place a unit at ${position}`);
		}
		this._position = position;
		this._start = position;
		this._currentGoal = position;

		if (!isValidName(options.name)) {
			throw new InvalidNameError(`Invalid unit name: "${options.name}"`);
		}
		this._name = options.name;
	}

	public get name(): string {
		return this._name;
	}

	/**
	 * @throws {InvalidNameError} The name fails {@link isValidName}
	 */
	public set name(value: string) {
		if (!isValidName(value)) {
			throw new InvalidNameError(`Invalid unit name: "${value}"`);
		}
		this._name = value;
	}

	public get strength(): number {
		return this._attributes.strength;
	}

	public set strength(value: number) {
		this.updateAttributes({ strength: value });
	}

	public get agility(): number {
		return this._attributes.agility;
	}

	public set agility(value: number) {
		this.updateAttributes({ agility: value });
	}

	public get toughness(): number {
		return this._attributes.toughness;
	}

	public set toughness(value: number) {
		this.updateAttributes({ toughness: value });
	}

	/**
	 * Never below half of strength plus agility.
	 */
	public get weight(): number {
		return this._attributes.weight;
	}

	public set weight(value: number) {
		this.updateAttributes({ weight: value });
	}

	private updateAttributes(change: Partial<UnitAttributeSet>): void {
		this._attributes = normalizeAttributes(
			{ ...this._attributes, ...change },
			RUNTIME_ATTRIBUTE_BOUNDS
		);
	}

	public get health(): number {
		return this._health;
	}

	public get stamina(): number {
		return this._stamina;
	}

	public get position(): Vector3 {
		return this._position;
	}

	/** Radians, measured in the horizontal plane. */
	public get orientation(): number {
		return this._orientation;
	}

	/** Cells per second on level ground, without sprinting. */
	public get baseSpeed(): number {
		return baseSpeed(this.strength, this.agility, this.weight);
	}

	/** Speed of the current step, before the sprint factor. */
	public get currentSpeed(): number {
		return this._currentSpeed;
	}

	/** Unit vector of the current step. */
	public get velocity(): Vector3 {
		return this._velocity;
	}

	public get isSprinting(): boolean {
		return this._sprinting && this._activity === ACTIVITY.WALKING;
	}

	public get start(): Vector3 {
		return this._start;
	}

	/** Centre of the adjacent cell currently walked to. */
	public get currentGoal(): Vector3 {
		return this._currentGoal;
	}

	/** The cell given to {@link Unit.moveTo}, until it is reached. */
	public get endGoal(): Vector3 | undefined {
		return this._endGoal;
	}

	public get hasEndGoal(): boolean {
		return this._endGoal !== undefined;
	}

	public get activity(): ACTIVITY {
		return this._activity;
	}

	public get activityTimer(): number {
		return this._activityTimer;
	}

	/** Seconds of work left while working. */
	public get workTimer(): number {
		return this._workTimer;
	}

	/** Seconds since the last rest started. */
	public get fatigueTimer(): number {
		return this._fatigueTimer;
	}

	public get mustRest(): boolean {
		return this._mustRest;
	}

	public get isIncapacitated(): boolean {
		return this._activity === ACTIVITY.INCAPACITATED;
	}

	private get isIdleOrWorking(): boolean {
		return (
			this._activity === ACTIVITY.IDLE || this._activity === ACTIVITY.WORKING
		);
	}

	private setActivity(next: ACTIVITY): void {
		if (next === this._activity) return;
		logger.debug(`${this._name}: ${this._activity} -> ${next}`);
		// a sprint only survives the brief idle between two path steps
		if (next !== ACTIVITY.WALKING && next !== ACTIVITY.IDLE) this._sprinting = false;
		this._activity = next;
	}

	/**
	 * Advances this unit by `dt` seconds.
	 *
	 * @throws {InvalidArgumentError} `dt` is not in (0, 0.2]; nothing changes
	 */
	public advance(dt: number): void {
		if (!(dt > 0 && dt <= MAX_TICK)) {
			throw new InvalidArgumentError(
				`Tick duration must lie in (0, ${MAX_TICK}], got ${dt}`
			);
		}
		if (this.isIncapacitated) return;

		this._fatigueTimer += dt;
		if (this._fatigueTimer >= FATIGUE_THRESHOLD) this._mustRest = true;

		if (this._mustRest) {
			logger.debug(`${this._name} is exhausted and has to rest`);
			this.enterRest();
			return;
		}

		switch (this._activity) {
			case ACTIVITY.WALKING:
				this.move(dt);
				break;
			case ACTIVITY.WORKING:
				this.work(dt);
				break;
			case ACTIVITY.RESTING:
				this.rest(dt);
				break;
			case ACTIVITY.ATTACKING:
				this._activityTimer -= dt;
				if (this._activityTimer <= 0) this.setActivity(ACTIVITY.IDLE);
				break;
			case ACTIVITY.IDLE:
				if (this.hasEndGoal) this.findPath();
				else if (this.autoBehavior && this.idleBehavior) {
					this.idleBehavior.act(this, this.random);
				}
				break;
			default:
				break;
		}
	}

	private move(dt: number): void {
		const factor = this._sprinting ? SPRINT_SPEED_FACTOR : 1;
		if (this._sprinting) {
			this._stamina = clampNumber(
				this._stamina - SPRINT_STAMINA_DRAIN * dt,
				0,
				this.maxStamina
			);
			if (this._stamina <= 0) this._sprinting = false;
		}

		const candidate = this._position.add(
			this._velocity.scale(dt * this._currentSpeed * factor)
		);
		const target = this._currentGoal.distanceTo(this._start);
		const traveled = candidate.distanceTo(this._start);
		if (traveled < target && this.boundary.inWorld(candidate)) {
			this._position = candidate;
			return;
		}

		// arrived; snap to avoid drift
		this._position = this._currentGoal;
		this.setActivity(ACTIVITY.IDLE);
		if (this._endGoal && !this._currentGoal.sameCell(this._endGoal)) {
			this.findPath();
		} else {
			this._endGoal = undefined;
			this._sprinting = false;
		}
	}

	/**
	 * Takes one step toward the end goal. Invalid steps are skipped.
	 */
	private findPath(): void {
		const goal = this._endGoal;
		if (!goal) return;
		const cell = this._position.floor();
		const target = goal.floor();
		const dx = Math.sign(target.x - cell.x);
		const dy = Math.sign(target.y - cell.y);
		const dz = Math.sign(target.z - cell.z);

		const centered = this._position.isAlmostEqual(this._position.cellCenter());
		if (dx === 0 && dy === 0 && dz === 0 && centered) {
			this._endGoal = undefined;
			this._sprinting = false;
			return;
		}

		try {
			this.moveToAdjacent(dx, dy, dz);
		} catch (error) {
			if (!isUnitError(error)) throw error;
			logger.debug(`${this._name} skipped a step toward ${goal}`, {
				reason: error.message,
			});
		}
	}

	/**
	 * Sets a destination cell and starts walking toward it one adjacent cell
	 * at a time. Does nothing while the activity lock holds.
	 *
	 * @throws {InvalidPositionError} The cell lies outside the boundary
	 */
	public moveTo(x: number, y: number, z: number): void {
		if (this.isIncapacitated || this._activityTimer > 0) return;
		const goal = new Vector3(x, y, z);
		if (!this.boundary.inWorld(goal)) {
			throw new InvalidPositionError(`Cannot move to ${goal}: outside the world`);
		}
		this._endGoal = goal;
		this.findPath();
	}

	/**
	 * Starts walking to the centre of a neighbouring cell.
	 * Only possible while idle or working, and not while the lock holds.
	 *
	 * @throws {InvalidArgumentError} An offset is not -1, 0 or 1
	 * @throws {InvalidPositionError} The neighbouring cell lies outside the boundary
	 */
	public moveToAdjacent(dx: number, dy: number, dz: number): void {
		if (this.isIncapacitated || this._activityTimer > 0) return;
		if (!this.isIdleOrWorking) return;
		for (const offset of [dx, dy, dz]) {
			if (!Number.isInteger(offset) || offset < -1 || offset > 1) {
				throw new InvalidArgumentError(
					`Adjacent offsets must be -1, 0 or 1, got (${dx}, ${dy}, ${dz})`
				);
			}
		}

		const goal = this._position.cellCenter().add(new Vector3(dx, dy, dz));
		if (!this.boundary.inWorld(goal)) {
			throw new InvalidPositionError(`Cannot move to ${goal}: outside the world`);
		}
		const direction = goal.subtract(this._position);
		if (direction.isAlmostEqual(Vector3.ZERO)) return;

		this._start = this._position;
		this._currentGoal = goal;
		this._velocity = direction.normalize();
		if (dz === 1) this._currentSpeed = CLIMB_SPEED_FACTOR * this.baseSpeed;
		else if (dz === -1) this._currentSpeed = DESCEND_SPEED_FACTOR * this.baseSpeed;
		else this._currentSpeed = this.baseSpeed;
		this.setActivity(ACTIVITY.WALKING);
		this._orientation = Math.atan2(this._velocity.y, this._velocity.x);
	}

	/**
	 * Doubles walking speed at the cost of stamina.
	 * Callers must only sprint while walking with stamina left.
	 */
	public startSprint(): void {
		assert.ok(this._stamina > 0, `${this._name} has no stamina to sprint`);
		assert.ok(
			this._activity === ACTIVITY.WALKING,
			`${this._name} can only sprint while walking`
		);
		this._sprinting = true;
	}

	public stopSprint(): void {
		assert.ok(this.isSprinting, `${this._name} is not sprinting`);
		this._sprinting = false;
	}

	/**
	 * Attacks a unit standing in or next to this unit's cell. Both turn to
	 * face each other and the victim defends before this call returns.
	 *
	 * @returns How the victim defended, or undefined if no attack took place
	 */
	public attack(victim: Unit): DEFENSE_OUTCOME | undefined {
		if (victim === this || this._activityTimer > 0) return undefined;
		if (this.isIncapacitated || victim.isIncapacitated) return undefined;
		if (!isWithinReach(this._position, victim._position)) return undefined;

		this._orientation = facing(this._position, victim._position);
		victim._orientation = facing(victim._position, this._position);
		this.setActivity(ACTIVITY.ATTACKING);
		this._activityTimer = ATTACK_LOCK_SECONDS;

		const outcome = victim.defend(this);
		logger.debug(`${this._name} attacks ${victim._name}: ${outcome}`);
		return outcome;
	}

	private defend(attacker: Unit): DEFENSE_OUTCOME {
		this.setActivity(ACTIVITY.DEFENDING);
		const outcome = rollDefense(this, attacker, this.random);
		switch (outcome) {
			case DEFENSE_OUTCOME.DODGE:
				this.dodge();
				break;
			case DEFENSE_OUTCOME.HIT:
				this.takeDamage(hitDamage(attacker));
				break;
			default:
				break;
		}
		if (!this.isIncapacitated) {
			this.setActivity(ACTIVITY.IDLE);
			this._activityTimer = UNLOCKED;
		}
		return outcome;
	}

	private dodge(): void {
		const target = pickDodgeTarget(this._position, this.boundary, this.random);
		if (!target) {
			logger.debug(`${this._name} has nowhere to dodge to`);
			return;
		}
		this._position = target;
	}

	private takeDamage(damage: number): void {
		const remaining = this._health - damage;
		if (remaining > 0) {
			this._health = remaining;
			return;
		}
		this._health = 0;
		this._endGoal = undefined;
		this._sprinting = false;
		this._mustRest = false;
		this._activityTimer = UNLOCKED;
		this.setActivity(ACTIVITY.INCAPACITATED);
		logger.info(`${this._name} is incapacitated`);
	}

	/**
	 * Starts working, or restarts the work if already working.
	 * Only possible while idle or working, and not while the lock holds.
	 */
	public startWork(): void {
		if (this.isIncapacitated || this._activityTimer > 0) return;
		if (!this.isIdleOrWorking) return;
		this.setActivity(ACTIVITY.WORKING);
		this._workTimer = WORK_EFFORT / this.strength;
	}

	private work(dt: number): void {
		this._workTimer -= dt;
		if (this._workTimer <= 0) this.setActivity(ACTIVITY.IDLE);
	}

	/**
	 * Interrupts whatever this unit is doing and starts resting.
	 * Does nothing while the lock holds.
	 */
	public startRest(): void {
		if (this.isIncapacitated || this._activityTimer > 0) return;
		this.enterRest();
	}

	private enterRest(): void {
		this.setActivity(ACTIVITY.RESTING);
		this._activityTimer = REST_EFFORT / this.toughness;
		this._mustRest = false;
		this._fatigueTimer = 0;
	}

	private rest(dt: number): void {
		this._activityTimer -= dt;
		const result = restRecovery(
			{
				health: this._health,
				maxHealth: this.maxHealth,
				stamina: this._stamina,
				maxStamina: this.maxStamina,
			},
			this.toughness,
			dt
		);
		this._health = result.health;
		this._stamina = result.stamina;
		if (result.recovered === undefined && this._activityTimer < 0) {
			this.setActivity(ACTIVITY.IDLE);
		}
	}

	/**
	 * Starts dancing. Only possible while idle and not while the lock holds.
	 */
	public startDance(): void {
		if (this.isIncapacitated || this._activityTimer > 0) return;
		if (this._activity !== ACTIVITY.IDLE) return;
		this.setActivity(ACTIVITY.DANCING);
	}

	public stopDance(): void {
		assert.ok(this._activity === ACTIVITY.DANCING, `${this._name} is not dancing`);
		this.setActivity(ACTIVITY.IDLE);
	}

	public toString(): string {
		return `${this._name} at ${this._position} (${this._activity})`;
	}
}
