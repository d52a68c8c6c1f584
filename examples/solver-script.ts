import { Effect } from "effect"
import { mkdirSync, writeFileSync } from "node:fs"
import { resolve } from "node:path"
import { ParamEngine } from "../src/Engine.js"
import { OrderedRecord } from "../src/OrderedRecord.js"
import { PathValue } from "../src/PathValue.js"
import { writeRecord } from "../src/Serialization.js"

const parameters = OrderedRecord.from({
  tEnd: "${steps}*${dt}",
  caseName: "$cavity",
  outDir: PathValue.of("examples/out/${caseName}/"),
  nx: 32,
  ny: "${nx}",
  lx: 1,
  dx: "${lx}/${nx}",
  dt: "0.5*${dx}",
  steps: 200,
  sensors: "$[0.25 0.5 0.75] * ${lx}",
})

const template = [
  "# solver input deck",
  "case ${caseName}",
  "% generated, do not edit by hand",
  "mesh ${nx} ${ny}",
  "spacing ${dx}",
  "${steps}*${dt}",
  "sensors ${sensors}",
].join("\n")

const program = Effect.gen(function* () {
  const engine = yield* ParamEngine
  const sorted = yield* engine.sort(parameters)
  const snapshot = yield* engine.evaluate(sorted)
  const script = yield* engine.formatEval(template, sorted)
  const summary = yield* engine.describe(sorted)
  return { sorted, snapshot, script, summary }
}).pipe(Effect.provide(ParamEngine.Default))

const writeOutputs = Effect.gen(function* () {
  const { script, snapshot, sorted, summary } = yield* program
  const outDir = resolve(String(snapshot.get("outDir")))

  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  yield* writeRecord(resolve(outDir, "parameters.txt"), sorted)
  yield* Effect.sync(() => writeFileSync(resolve(outDir, "solver.in"), `${script}\n`, "utf-8"))
  yield* Effect.log(summary)
})

Effect.runPromise(writeOutputs).catch((error) => {
  console.error("Failed to generate the solver script example", error)
  process.exitCode = 1
})
