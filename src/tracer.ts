import { getLogger } from "./common/logger";
import type { Logger, LogLevel } from "./common/logger";
import type { Roll, Tracer } from "./types";

export const DEFAULT_TRACE_FORMAT = "[{method}] - {rollable} : {trace} = {result}";

/** Discards every record. */
export class NullTracer implements Tracer {
  append(_roll: Roll): void {}
}

/** Keeps every record in arrival order. */
export class MemoryTracer implements Tracer {
  private readonly rolls: Roll[] = [];

  append(roll: Roll): void {
    this.rolls.push(roll);
  }

  all(): readonly Roll[] {
    return [...this.rolls];
  }

  clear(): void {
    this.rolls.length = 0;
  }

  get size(): number {
    return this.rolls.length;
  }
}

/**
 * Writes one line per record to a logger.
 *
 * Placeholders in `format`: `{method}`, `{rollable}` (the node notation),
 * `{trace}` and `{result}`. Without a logger the library logger is used at
 * the time of each record.
 */
export class LogTracer implements Tracer {
  constructor(
    private readonly logger?: Logger,
    private readonly level: LogLevel = "debug",
    private readonly format: string = DEFAULT_TRACE_FORMAT
  ) {}

  append(roll: Roll): void {
    const logger = this.logger ?? getLogger();
    logger[this.level](formatRoll(roll, this.format));
  }
}

export function formatRoll(roll: Roll, format: string = DEFAULT_TRACE_FORMAT): string {
  const replacements: Record<string, string> = {
    "{method}": roll.source.method,
    "{rollable}": roll.source.rollable.notation(),
    "{trace}": roll.operation,
    "{result}": `${roll.value}`,
  };

  return format.replace(/\{(method|rollable|trace|result)\}/g, (placeholder) => {
    return replacements[placeholder] ?? placeholder;
  });
}

/** Hands a roll to a tracer; a failing tracer is logged and ignored. */
export function notifyTracer(tracer: Tracer, roll: Roll): void {
  try {
    tracer.append(roll);
  } catch (error) {
    getLogger().warn(
      `Tracer failed while recording ${roll.source.method} of ${roll.source.rollable.notation()}: ${String(error)}`
    );
  }
}
