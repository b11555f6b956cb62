import { NullTracer, notifyTracer } from "./tracer";
import type { Roll, Rollable, RollMethod, SupportsTracing, Tracer } from "./types";

/**
 * Shared plumbing of every node: the last-trace field and the tracer hook.
 *
 * Subclasses route each result through `record()`, which stores the
 * operation text, forwards the roll to the tracer and hands it back.
 */
export abstract class TraceableRollable implements Rollable, SupportsTracing {
  private trace = "";
  private tracer: Tracer = new NullTracer();

  abstract minimum(): number;
  abstract maximum(): number;
  abstract roll(): Roll;
  abstract notation(): string;
  abstract clone(): Rollable;

  getTrace(): string {
    return this.trace;
  }

  setTracer(tracer: Tracer): void {
    this.tracer = tracer;
  }

  getTracer(): Tracer {
    return this.tracer;
  }

  toJSON(): string {
    return this.notation();
  }

  toString(): string {
    return this.notation();
  }

  protected record(value: number, operation: string, method: RollMethod): Roll {
    const roll: Roll = Object.freeze({
      value,
      operation,
      source: Object.freeze({ rollable: this, method }),
    });

    this.trace = operation;
    notifyTracer(this.tracer, roll);

    return roll;
  }

  /** Copies the tracer of this node onto a freshly cloned one. */
  protected withSameTracer<T extends TraceableRollable>(copy: T): T {
    copy.setTracer(this.tracer);
    return copy;
  }
}
