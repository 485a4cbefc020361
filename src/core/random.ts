/**
 * Random number sources.
 *
 * Everything random a unit does (dodge and block rolls, dodge targets, idle
 * choices) goes through a {@link RandomSource} handed to it at construction,
 * so tests can script the rolls and simulations can be replayed from a seed.
 *
 * @module core/random
 */

/**
 * Uniform random generator used by units.
 */
export interface RandomSource {
	/** Integer in [0, bound). */
	nextInt(bound: number): number;
	/** Float in [0, 1). */
	nextDouble(): number;
}

/**
 * Unseeded source backed by Math.random.
 */
export class MathRandomSource implements RandomSource {
	public nextInt(bound: number): number {
		const max = Math.floor(bound);
		if (!(max > 0)) return 0;
		return Math.floor(Math.random() * max);
	}

	public nextDouble(): number {
		return Math.random();
	}
}

/**
 * Snapshot of a seeded source, enough to resume the same sequence.
 */
export type RandomSnapshot = {
	alg: "mulberry32";
	state: number;
};

/**
 * Deterministic, seedable source (mulberry32).
 * Two sources built from the same seed produce the same sequence.
 */
export class SeededRandomSource implements RandomSource {
	private state: number;

	constructor(seedOrSnapshot: number | RandomSnapshot) {
		if (typeof seedOrSnapshot === "number") {
			this.state = seedOrSnapshot >>> 0;
		} else {
			this.state = seedOrSnapshot.state >>> 0;
		}

		// mulberry32 degenerates at 0
		if (this.state === 0) this.state = 0x12345678;
	}

	public snapshot(): RandomSnapshot {
		return { alg: "mulberry32", state: this.state >>> 0 };
	}

	/** uint32 in [0, 2^32). */
	public nextUint32(): number {
		let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return (t ^ (t >>> 14)) >>> 0;
	}

	public nextDouble(): number {
		return this.nextUint32() / 4294967296;
	}

	public nextInt(bound: number): number {
		const max = Math.floor(bound);
		if (!(max > 0)) return 0;
		return this.nextUint32() % max;
	}
}

/**
 * Replays fixed sequences of values, e.g. recorded rolls.
 * Throws once a sequence runs out.
 *
 * @example
 * ```typescript
 * const random = new ScriptedRandomSource({ doubles: [0.9, 0.1], ints: [2] });
 * random.nextDouble(); // 0.9
 * random.nextInt(8); // 2
 * ```
 */
export class ScriptedRandomSource implements RandomSource {
	private readonly doubles: number[];
	private readonly ints: number[];

	constructor(script: { doubles?: number[]; ints?: number[] }) {
		this.doubles = [...(script.doubles ?? [])];
		this.ints = [...(script.ints ?? [])];
	}

	/** Values not yet drawn. */
	public get remaining(): { doubles: number; ints: number } {
		return { doubles: this.doubles.length, ints: this.ints.length };
	}

	public nextDouble(): number {
		const value = this.doubles.shift();
		if (value === undefined) throw new RangeError("No scripted doubles left");
		return value;
	}

	public nextInt(bound: number): number {
		const value = this.ints.shift();
		if (value === undefined) throw new RangeError("No scripted integers left");
		if (value < 0 || value >= bound) {
			throw new RangeError(`Scripted integer ${value} is outside [0, ${bound})`);
		}
		return value;
	}
}
