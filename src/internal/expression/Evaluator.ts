import { Option } from "effect"
import { ErrorMarker } from "../../Errors.js"
import { OrderedRecord, isList } from "../../OrderedRecord.js"
import type { FieldValue } from "../../Types.js"
import { transpose } from "../array/LinearAlgebra.js"
import { ArrayError, NdArray, isNestedNumbers } from "../array/NdArray.js"
import { BinaryFunctions, combine, describeType, mapNumeric, matmulValues, toNumeric } from "./Arithmetic.js"
import type { BinaryNode, CallNode, Expr, IndexArg, IndexNode, ListLiteralNode } from "./Ast.js"
import { BUILTIN_CONSTANTS, BUILTIN_FUNCTIONS } from "./Builtins.js"
import { ExpressionEvaluationError, MarkedReferenceError, UnresolvedReferenceError } from "./errors.js"
import { parseExpressionAst } from "./Parser.js"
import { printExpr } from "./Pretty.js"

export type Scope = (name: string) => Option.Option<FieldValue>

export const emptyScope: Scope = () => Option.none()

interface EvalContext {
  readonly scope: Scope
  readonly source: string
}

type Selector =
  | { readonly _tag: "Point"; readonly index: number }
  | { readonly _tag: "Slice"; readonly start?: number; readonly stop?: number; readonly step?: number }

const fail = (ctx: EvalContext, problem: string): never => {
  throw new ExpressionEvaluationError({ expression: ctx.source, problem })
}

const lookupReference = (name: string, ctx: EvalContext): FieldValue => {
  const found = ctx.scope(name)
  if (Option.isSome(found)) {
    if (found.value instanceof ErrorMarker) {
      throw new MarkedReferenceError({ name, marker: found.value })
    }
    return found.value
  }
  if (name === "None") {
    return null
  }
  const constant = BUILTIN_CONSTANTS[name]
  if (constant === undefined) {
    throw new UnresolvedReferenceError({ expression: ctx.source, name })
  }
  return constant
}

const integerOf = (value: FieldValue, ctx: EvalContext): number => {
  const numeric = typeof value === "boolean" ? Number(value) : value
  if (typeof numeric !== "number" || !Number.isInteger(numeric)) {
    return fail(ctx, `indices must be integers, got ${describeType(value)}`)
  }
  return numeric
}

const resolveSelector = (arg: IndexArg, ctx: EvalContext): Selector => {
  if (arg._tag === "Point") {
    return { _tag: "Point", index: integerOf(evaluateExpr(arg.expr, ctx), ctx) }
  }
  const bound = (expr: Expr | undefined): number | undefined =>
    expr === undefined ? undefined : integerOf(evaluateExpr(expr, ctx), ctx)
  const start = bound(arg.start)
  const stop = bound(arg.stop)
  const step = bound(arg.step)
  return {
    _tag: "Slice",
    ...(start === undefined ? {} : { start }),
    ...(stop === undefined ? {} : { stop }),
    ...(step === undefined ? {} : { step }),
  }
}

const pointIndex = (index: number, length: number, ctx: EvalContext): number => {
  const position = index < 0 ? index + length : index
  if (position < 0 || position >= length) {
    return fail(ctx, `index ${index} is out of range for length ${length}`)
  }
  return position
}

/** Positions selected by a slice; out-of-range bounds are clamped, never rejected. */
export const sliceIndices = (
  length: number,
  start: number | undefined,
  stop: number | undefined,
  step = 1,
): ReadonlyArray<number> => {
  if (step === 0) {
    throw new ArrayError({ operation: "slice", problem: "slice step cannot be zero" })
  }
  const normalize = (value: number): number => (value < 0 ? value + length : value)
  const clamp = (value: number, lo: number, hi: number): number => Math.min(hi, Math.max(lo, value))
  const positions: Array<number> = []
  if (step > 0) {
    const from = start === undefined ? 0 : clamp(normalize(start), 0, length)
    const to = stop === undefined ? length : clamp(normalize(stop), 0, length)
    for (let i = from; i < to; i += step) {
      positions.push(i)
    }
  } else {
    const from = start === undefined ? length - 1 : clamp(normalize(start), -1, length - 1)
    const to = stop === undefined ? -1 : clamp(normalize(stop), -1, length - 1)
    for (let i = from; i > to; i += step) {
      positions.push(i)
    }
  }
  return positions
}

const selectorPositions = (selector: Selector, length: number, ctx: EvalContext): ReadonlyArray<number> =>
  selector._tag === "Point"
    ? [pointIndex(selector.index, length, ctx)]
    : sliceIndices(length, selector.start, selector.stop, selector.step)

const indexArray = (array: NdArray, selectors: ReadonlyArray<Selector>, ctx: EvalContext): FieldValue => {
  if (selectors.length > array.rank) {
    return fail(ctx, `too many indices for an array of rank ${array.rank}`)
  }
  const axes = array.shape.map((extent, axis) => {
    const selector: Selector = selectors[axis] ?? { _tag: "Slice" }
    return { positions: selectorPositions(selector, extent, ctx), kept: selector._tag === "Slice" }
  })
  const shape = axes.filter((axis) => axis.kept).map((axis) => axis.positions.length)
  const data: Array<number> = []
  const visit = (axis: number, prefix: ReadonlyArray<number>): void => {
    const current = axes[axis]
    if (!current) {
      data.push(array.get(prefix))
      return
    }
    for (const position of current.positions) {
      visit(axis + 1, [...prefix, position])
    }
  }
  visit(0, [])
  if (shape.length === 0) {
    return data[0] ?? Number.NaN
  }
  return shape.length === 1 ? data : new NdArray(shape, data)
}

const indexList = (list: ReadonlyArray<FieldValue>, selectors: ReadonlyArray<Selector>, ctx: EvalContext): FieldValue => {
  const [first, ...rest] = selectors
  if (!first) {
    return list
  }
  if (first._tag === "Slice") {
    if (rest.length > 0) {
      return fail(ctx, "a list slice cannot be followed by further indices")
    }
    return sliceIndices(list.length, first.start, first.stop, first.step).map((i) => list[i] ?? null)
  }
  const item = list[pointIndex(first.index, list.length, ctx)] ?? null
  return rest.length === 0 ? item : indexValue(item, rest, ctx)
}

const indexValue = (target: FieldValue, selectors: ReadonlyArray<Selector>, ctx: EvalContext): FieldValue => {
  if (target instanceof NdArray) {
    return indexArray(target, selectors, ctx)
  }
  if (isList(target)) {
    return indexList(target, selectors, ctx)
  }
  return fail(ctx, `cannot index a ${describeType(target)}`)
}

const evaluateIndex = (node: IndexNode, ctx: EvalContext): FieldValue => {
  const target = evaluateExpr(node.target, ctx)
  if (!(target instanceof NdArray) && !isList(target)) {
    return fail(ctx, `cannot index ${printExpr(node.target)}, a ${describeType(target)}`)
  }
  return indexValue(
    target,
    node.args.map((arg) => resolveSelector(arg, ctx)),
    ctx,
  )
}

const evaluateList = (node: ListLiteralNode, ctx: EvalContext): FieldValue => {
  const items = node.items.map((item) => {
    const value = evaluateExpr(item, ctx)
    return value instanceof NdArray ? value.toNested() : value
  })
  if (items.every((item): item is number => typeof item === "number")) {
    return items
  }
  if (isNestedNumbers(items)) {
    try {
      const array = NdArray.fromNested(items)
      return array.rank === 1 ? [...array.data] : array
    } catch (error) {
      if (error instanceof ArrayError) {
        return items
      }
      throw error
    }
  }
  return items
}

const evaluateBinary = (node: BinaryNode, ctx: EvalContext): FieldValue => {
  const left = toNumeric(evaluateExpr(node.left, ctx), node.op)
  const right = toNumeric(evaluateExpr(node.right, ctx), node.op)
  if (node.op === "@") {
    return matmulValues(left, right)
  }
  return combine(left, right, BinaryFunctions[node.op], node.op)
}

const evaluateCall = (node: CallNode, ctx: EvalContext): FieldValue => {
  const fn = BUILTIN_FUNCTIONS[node.name]
  if (!fn) {
    return fail(ctx, `Unknown function "${node.name}"`)
  }
  return fn(node.args.map((arg) => evaluateExpr(arg, ctx)))
}

const evaluateExpr = (expr: Expr, ctx: EvalContext): FieldValue => {
  switch (expr._tag) {
    case "NumberLiteral":
    case "BooleanLiteral":
    case "StringLiteral":
      return expr.value
    case "Ref":
      return lookupReference(expr.name, ctx)
    case "Unary": {
      const value = toNumeric(evaluateExpr(expr.expr, ctx), expr.op === "Neg" ? "negate" : "plus")
      return expr.op === "Neg" ? mapNumeric(value, (x) => -x) : value
    }
    case "Binary":
      return evaluateBinary(expr, ctx)
    case "Call":
      return evaluateCall(expr, ctx)
    case "Index":
      return evaluateIndex(expr, ctx)
    case "Transpose": {
      const value = toNumeric(evaluateExpr(expr.target, ctx), "transpose")
      return value instanceof NdArray ? transpose(value) : value
    }
    case "ListLiteral":
      return evaluateList(expr, ctx)
    case "RecordLiteral":
      return new OrderedRecord(expr.entries.map((entry) => [entry.key, evaluateExpr(entry.value, ctx)] as const))
    default: {
      const exhaustive: never = expr
      throw exhaustive
    }
  }
}

export const evaluateExpressionAst = (expr: Expr, scope: Scope, source: string): FieldValue => {
  const ctx: EvalContext = { scope, source }
  try {
    return evaluateExpr(expr, ctx)
  } catch (error) {
    if (error instanceof ArrayError) {
      throw new ExpressionEvaluationError({ expression: source, problem: error.message })
    }
    throw error
  }
}

/**
 * Parses and evaluates one expression. Throws `ExpressionDiagnosticError` for
 * malformed input, `UnresolvedReferenceError` for unknown names,
 * `MarkedReferenceError` when a referenced field failed earlier, and
 * `ExpressionEvaluationError` otherwise.
 */
export const evaluateExpression = (source: string, scope: Scope = emptyScope): FieldValue =>
  evaluateExpressionAst(parseExpressionAst(source), scope, source)
