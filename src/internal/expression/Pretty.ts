import type { Expr, IndexArg } from "./Ast.js"

/**
 * Fully parenthesised rendering of an expression tree; it re-parses to the
 * same tree. Evaluation errors quote subexpressions with it.
 */
export const printExpr = (expr: Expr): string => {
  switch (expr._tag) {
    case "NumberLiteral":
      return String(expr.value)
    case "BooleanLiteral":
      return expr.value ? "true" : "false"
    case "StringLiteral":
      return JSON.stringify(expr.value)
    case "Ref":
      return expr.name
    case "Unary":
      return `${expr.op === "Neg" ? "-" : "+"}${wrap(expr.expr)}`
    case "Binary":
      return `${wrap(expr.left)} ${expr.op} ${wrap(expr.right)}`
    case "Call":
      return `${expr.name}(${expr.args.map(printExpr).join(", ")})`
    case "Index":
      return `${wrap(expr.target)}[${expr.args.map(printIndexArg).join(", ")}]`
    case "Transpose":
      return `${wrap(expr.target)}.T`
    case "ListLiteral":
      return `[${expr.items.map(printExpr).join(", ")}]`
    case "RecordLiteral":
      return `{${expr.entries.map((entry) => `${entry.key}: ${printExpr(entry.value)}`).join(", ")}}`
    default: {
      const exhaustive: never = expr
      return exhaustive
    }
  }
}

const wrap = (expr: Expr): string =>
  expr._tag === "Unary" || expr._tag === "Binary" ? `(${printExpr(expr)})` : printExpr(expr)

const printIndexArg = (arg: IndexArg): string => {
  if (arg._tag === "Point") {
    return printExpr(arg.expr)
  }
  const start = arg.start ? printExpr(arg.start) : ""
  const stop = arg.stop ? printExpr(arg.stop) : ""
  return arg.step ? `${start}:${stop}:${printExpr(arg.step)}` : `${start}:${stop}`
}
