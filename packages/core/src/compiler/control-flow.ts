/**
 * Structured control flow to basic blocks
 */

import type { TypedBlock, TypedExpr, TypedFor, TypedStmt } from "./matc/typed-ast.js";
import type { IRValue } from "../types/ir.js";
import type { FunctionBuilder } from "./ir-builder.js";

/** Callbacks into the generator for the parts a construct contains */
export interface StatementLowerer {
  readonly builder: FunctionBuilder;
  expression(expr: TypedExpr): IRValue;
  block(block: TypedBlock): void;
}

/**
 * Rewrite `for (init; cond; update) body` as
 * `{ init; while (cond) { body...; update; } }`.
 *
 * The update is appended to the body's own statements, so it runs in the
 * body's scope and sees the body's locals.
 */
export function desugarFor(stmt: TypedFor): TypedBlock {
  const loopBody: TypedBlock = {
    kind: "block",
    body: [...stmt.body.body, { kind: "expr", expr: stmt.update }],
    scope: stmt.body.scope,
  };
  const loop: TypedStmt = { kind: "while", condition: stmt.condition, body: loopBody };

  return {
    kind: "block",
    body: [{ kind: "expr", expr: stmt.init }, loop],
    scope: stmt.scope,
  };
}

/** then / else / merge; the branch is placed in the block holding the condition */
export function lowerIf(
  lower: StatementLowerer,
  condition: TypedExpr,
  thenBranch: TypedBlock,
  elseBranch: TypedBlock
): void {
  const { builder } = lower;
  const test = lower.expression(condition);
  const origin = builder.current;

  const thenBlock = builder.createBlock("then");
  builder.positionAt(thenBlock);
  lower.block(thenBranch);
  const thenEnd = builder.current;

  const elseBlock = builder.createBlock("else");
  builder.positionAt(elseBlock);
  lower.block(elseBranch);
  const elseEnd = builder.current;

  const merge = builder.createBlock("merge");
  for (const end of [thenEnd, elseEnd]) {
    builder.positionAt(end);
    builder.branchIfOpen(merge);
  }

  builder.positionAt(origin);
  builder.terminate({ op: "condbr", condition: test, ifTrue: thenBlock.label, ifFalse: elseBlock.label });
  builder.positionAt(merge);
}

/** while (predicate) / while_body / merge */
export function lowerWhile(lower: StatementLowerer, condition: TypedExpr, body: TypedBlock): void {
  const { builder } = lower;

  const predicate = builder.createBlock("while");
  builder.terminate({ op: "br", target: predicate.label });

  const bodyBlock = builder.createBlock("while_body");
  builder.positionAt(bodyBlock);
  lower.block(body);
  builder.branchIfOpen(predicate);

  builder.positionAt(predicate);
  const test = lower.expression(condition);
  const merge = builder.createBlock("merge");
  builder.terminate({ op: "condbr", condition: test, ifTrue: bodyBlock.label, ifFalse: merge.label });
  builder.positionAt(merge);
}
