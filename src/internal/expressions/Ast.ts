export type NodeId = string

export interface Span {
  readonly start: number
  readonly end: number
  readonly line: number
  readonly column: number
}

export type UnaryOp = "Neg" | "Pos" | "Not"
export type BinaryOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "^"
  | "<"
  | "<="
  | ">"
  | ">="
  | "=="
  | "!="
  | "AND"
  | "OR"

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

export interface IfBranch {
  readonly cond: Expr
  readonly then: Expr
}

export interface IfChainNode {
  readonly _tag: "IfChain"
  readonly id: NodeId
  readonly branches: ReadonlyArray<IfBranch>
  readonly elseBranch?: Expr
  readonly span: Span
}

/**
 * Call of an allow-listed function. `name` is stored lower-cased; the parser
 * rejects every name outside the allow-list.
 */
export interface CallNode {
  readonly _tag: "Call"
  readonly id: NodeId
  readonly name: string
  readonly args: ReadonlyArray<Expr>
  readonly span: Span
}

export interface TimeNode {
  readonly _tag: "Time"
  readonly id: NodeId
  readonly span: Span
}

export type Expr =
  | NumberLiteralNode
  | BooleanLiteralNode
  | ReferenceNode
  | UnaryNode
  | BinaryNode
  | IfChainNode
  | CallNode
  | TimeNode

export interface ExpressionNode {
  readonly _tag: "Expression"
  readonly id: NodeId
  readonly expr: Expr
  readonly span: Span
}

/**
 * Names referenced by an expression tree, in first-occurrence order.
 */
export const collectReferences = (expr: Expr): ReadonlyArray<string> => {
  const seen = new Set<string>()
  const visit = (node: Expr): void => {
    switch (node._tag) {
      case "Ref":
        seen.add(node.name)
        return
      case "Unary":
        visit(node.expr)
        return
      case "Binary":
        visit(node.left)
        visit(node.right)
        return
      case "IfChain":
        for (const branch of node.branches) {
          visit(branch.cond)
          visit(branch.then)
        }
        if (node.elseBranch) {
          visit(node.elseBranch)
        }
        return
      case "Call":
        node.args.forEach(visit)
        return
      case "NumberLiteral":
      case "BooleanLiteral":
      case "Time":
        return
    }
  }
  visit(expr)
  return Array.from(seen)
}
