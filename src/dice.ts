import { InvalidDie } from "./errors";
import { getDefaultRandomness } from "./random";
import { TraceableRollable } from "./rollable";
import type { RandomnessProvider, Roll } from "./types";

/**
 * A die with faces 1..sides.
 *
 * Without an explicit provider the die draws from the library default at
 * roll time, so `setDefaultRandomness` also affects existing dice.
 */
export class SidedDie extends TraceableRollable {
  constructor(
    readonly sides: number,
    protected readonly randomness?: RandomnessProvider
  ) {
    super();
    if (!Number.isSafeInteger(sides) || sides < 2) {
      throw InvalidDie.dueToSideCount(sides);
    }
  }

  minimum(): number {
    return this.record(1, "1", "minimum").value;
  }

  maximum(): number {
    return this.record(this.sides, `${this.sides}`, "maximum").value;
  }

  roll(): Roll {
    const value = (this.randomness ?? getDefaultRandomness()).next(1, this.sides);
    return this.record(value, `${value}`, "roll");
  }

  notation(): string {
    return `D${this.sides}`;
  }

  clone(): SidedDie {
    return this.withSameTracer(new SidedDie(this.sides, this.randomness));
  }
}

/** A die with 100 sides, written `D%`. */
export class PercentileDie extends SidedDie {
  constructor(randomness?: RandomnessProvider) {
    super(100, randomness);
  }

  notation(): string {
    return "D%";
  }

  clone(): PercentileDie {
    return this.withSameTracer(new PercentileDie(this.randomness));
  }
}

/**
 * A die with an arbitrary list of faces. Faces may repeat or be negative;
 * a roll picks a face position uniformly.
 */
export class CustomDie extends TraceableRollable {
  readonly faces: readonly number[];

  constructor(
    faces: readonly number[],
    protected readonly randomness?: RandomnessProvider
  ) {
    super();
    if (faces.length === 0) {
      throw InvalidDie.dueToMissingFaces();
    }

    const invalid = faces.find((face) => !Number.isSafeInteger(face));
    if (invalid !== undefined) {
      throw InvalidDie.dueToInvalidFace(invalid);
    }

    this.faces = [...faces];
  }

  get size(): number {
    return this.faces.length;
  }

  minimum(): number {
    const value = Math.min(...this.faces);
    return this.record(value, `${value}`, "minimum").value;
  }

  maximum(): number {
    const value = Math.max(...this.faces);
    return this.record(value, `${value}`, "maximum").value;
  }

  roll(): Roll {
    const index = (this.randomness ?? getDefaultRandomness()).next(0, this.faces.length - 1);
    const value = this.faces[index];
    return this.record(value, `${value}`, "roll");
  }

  notation(): string {
    return `D[${this.faces.join(",")}]`;
  }

  clone(): CustomDie {
    return this.withSameTracer(new CustomDie(this.faces, this.randomness));
  }
}

/** The Fate/Fudge die: faces -1, 0 and 1, written `DF`. */
export class FudgeDie extends CustomDie {
  constructor(randomness?: RandomnessProvider) {
    super([-1, 0, 1], randomness);
  }

  notation(): string {
    return "DF";
  }

  clone(): FudgeDie {
    return this.withSameTracer(new FudgeDie(this.randomness));
  }
}
