export type NodeId = string

export interface Span {
  readonly start: number
  readonly end: number
  readonly line: number
  readonly column: number
}

export type UnaryOp = "Neg" | "Pos"
export type BinaryOp = "+" | "-" | "*" | "/" | "//" | "%" | "^" | "@"

export interface NumberLiteralNode {
  readonly _tag: "NumberLiteral"
  readonly id: NodeId
  readonly value: number
  readonly span: Span
}

export interface BooleanLiteralNode {
  readonly _tag: "BooleanLiteral"
  readonly id: NodeId
  readonly value: boolean
  readonly span: Span
}

export interface StringLiteralNode {
  readonly _tag: "StringLiteral"
  readonly id: NodeId
  readonly value: string
  readonly span: Span
}

export interface ReferenceNode {
  readonly _tag: "Ref"
  readonly id: NodeId
  readonly name: string
  readonly span: Span
}

export interface UnaryNode {
  readonly _tag: "Unary"
  readonly id: NodeId
  readonly op: UnaryOp
  readonly expr: Expr
  readonly span: Span
}

export interface BinaryNode {
  readonly _tag: "Binary"
  readonly id: NodeId
  readonly op: BinaryOp
  readonly left: Expr
  readonly right: Expr
  readonly span: Span
}

export interface CallNode {
  readonly _tag: "Call"
  readonly id: NodeId
  readonly name: string
  readonly args: ReadonlyArray<Expr>
  readonly span: Span
}

export interface PointIndex {
  readonly _tag: "Point"
  readonly expr: Expr
}

export interface SliceIndex {
  readonly _tag: "Slice"
  readonly start?: Expr
  readonly stop?: Expr
  readonly step?: Expr
}

export type IndexArg = PointIndex | SliceIndex

export interface IndexNode {
  readonly _tag: "Index"
  readonly id: NodeId
  readonly target: Expr
  readonly args: ReadonlyArray<IndexArg>
  readonly span: Span
}

export interface TransposeNode {
  readonly _tag: "Transpose"
  readonly id: NodeId
  readonly target: Expr
  readonly span: Span
}

export interface ListLiteralNode {
  readonly _tag: "ListLiteral"
  readonly id: NodeId
  readonly items: ReadonlyArray<Expr>
  readonly span: Span
}

export interface RecordEntry {
  readonly key: string
  readonly value: Expr
}

export interface RecordLiteralNode {
  readonly _tag: "RecordLiteral"
  readonly id: NodeId
  readonly entries: ReadonlyArray<RecordEntry>
  readonly span: Span
}

export type Expr =
  | NumberLiteralNode
  | BooleanLiteralNode
  | StringLiteralNode
  | ReferenceNode
  | UnaryNode
  | BinaryNode
  | CallNode
  | IndexNode
  | TransposeNode
  | ListLiteralNode
  | RecordLiteralNode
