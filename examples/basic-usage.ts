import { MemoryTracer, formatRoll, parse, seededRandomness } from "../src/index";

function rollExample(expression: string) {
  const rollable = parse(expression, { randomness: seededRandomness("basic-usage") });
  const result = rollable.roll();

  console.log(`${rollable.notation()}`);
  console.log(`  range:  ${rollable.minimum()} .. ${rollable.maximum()}`);
  console.log(`  rolled: ${result.operation} = ${result.value}\n`);
}

function traceExample(expression: string) {
  const tracer = new MemoryTracer();
  parse(expression, { tracer }).roll();

  console.log(`Trace of ${expression}`);
  for (const record of tracer.all()) {
    console.log(`  ${formatRoll(record)}`);
  }
}

rollExample("4d6 kh3");
rollExample("3D20+4+D4!>3/4^3");
rollExample("(2d3+d4)!=3");
traceExample("2d6+1");
