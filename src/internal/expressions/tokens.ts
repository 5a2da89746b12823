import { createToken, Lexer } from "chevrotain"

/**
 * Token definitions for the rate expression lexer. Keywords are
 * case-insensitive and fall back to `Identifier` when they are only the prefix
 * of a longer name (`endowment`, `orders`). `TIME` is matched in upper case only
 * so stocks named `time` stay addressable.
 */

export const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/,
})

export const ReferenceLiteral = createToken({ name: "ReferenceLiteral", pattern: /\[[^\]]*\]/ })

export const Identifier = createToken({ name: "Identifier", pattern: /[A-Za-z_][A-Za-z0-9_]*/ })

const keyword = (name: string, pattern: RegExp) =>
  createToken({ name, pattern, longer_alt: Identifier })

export const If = keyword("If", /if/i)
export const Then = keyword("Then", /then/i)
export const ElseIf = keyword("ElseIf", /elseif/i)
export const Else = keyword("Else", /else/i)
export const End = keyword("End", /end/i)
export const And = keyword("And", /and/i)
export const Or = keyword("Or", /or/i)
export const Not = keyword("Not", /not/i)
export const BooleanTrue = keyword("BooleanTrue", /true/i)
export const BooleanFalse = keyword("BooleanFalse", /false/i)
export const TimeKeyword = keyword("TimeKeyword", /TIME/)

export const KeywordTokens = [ElseIf, Else, If, Then, End, And, Or, Not, BooleanTrue, BooleanFalse, TimeKeyword]

export const DoubleAmpersand = createToken({ name: "DoubleAmpersand", pattern: /&&/ })
export const DoublePipe = createToken({ name: "DoublePipe", pattern: /\|\|/ })
export const DoubleStar = createToken({ name: "DoubleStar", pattern: /\*\*/ })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Percent = createToken({ name: "Percent", pattern: /%/ })
export const Caret = createToken({ name: "Caret", pattern: /\^/ })
export const EqEq = createToken({ name: "EqEq", pattern: /==/ })
export const BangEq = createToken({ name: "BangEq", pattern: /!=/ })
export const LtEq = createToken({ name: "LtEq", pattern: /<=/ })
export const GtEq = createToken({ name: "GtEq", pattern: />=/ })
export const Lt = createToken({ name: "Lt", pattern: /</ })
export const Gt = createToken({ name: "Gt", pattern: />/ })
export const Bang = createToken({ name: "Bang", pattern: /!/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const Comma = createToken({ name: "Comma", pattern: /,/ })
export const Dot = createToken({ name: "Dot", pattern: /\./ })

export const ExpressionTokens = [
  WhiteSpace,
  NumberLiteral,
  ReferenceLiteral,
  ...KeywordTokens,
  Identifier,
  DoubleAmpersand,
  DoublePipe,
  DoubleStar,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  Caret,
  EqEq,
  BangEq,
  LtEq,
  GtEq,
  Lt,
  Gt,
  Bang,
  LParen,
  RParen,
  Comma,
  Dot,
]

export const ExpressionLexer = new Lexer(ExpressionTokens, { positionTracking: "full" })
