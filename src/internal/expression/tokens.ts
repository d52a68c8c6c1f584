import { Lexer, createToken } from "chevrotain"

/**
 * Token definitions for the arithmetic mini-language evaluated inside field
 * values. Boolean keywords take the identifier token as their longer
 * alternative so names such as `trueValue` still lex as identifiers.
 */

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
})

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/,
})

export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z_][A-Za-z0-9_]*/ })

export const BooleanTrue = createToken({
  name: "BooleanTrue",
  pattern: /true|True|TRUE/,
  longer_alt: Identifier,
})

export const BooleanFalse = createToken({
  name: "BooleanFalse",
  pattern: /false|False|FALSE/,
  longer_alt: Identifier,
})

export const DoubleStar = createToken({ name: "DoubleStar", pattern: /\*\*/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const DoubleSlash = createToken({ name: "DoubleSlash", pattern: /\/\// })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const Percent = createToken({ name: "Percent", pattern: /%/ })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const At = createToken({ name: "At", pattern: /@/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ })
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ })
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ })
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ })
export const Comma = createToken({ name: "Comma", pattern: /,/ })
export const Colon = createToken({ name: "Colon", pattern: /:/ })
export const Dot = createToken({ name: "Dot", pattern: /\./ })
export const Unknown = createToken({ name: "Unknown", pattern: /[^\s]/ })

export const ExpressionTokens = [
  WhiteSpace,
  NumberLiteral,
  StringLiteral,
  BooleanTrue,
  BooleanFalse,
  Identifier,
  DoubleStar,
  Star,
  DoubleSlash,
  Slash,
  Plus,
  Minus,
  Percent,
  Caret,
  At,
  LParen,
  RParen,
  LBracket,
  RBracket,
  LBrace,
  RBrace,
  Comma,
  Colon,
  Dot,
  Unknown,
]

export const ExpressionLexer = new Lexer(ExpressionTokens, { ensureOptimizations: false })
