import { traceLog } from "../shared/index.js";
import { formatAst } from "./format.js";
import { MalformedRpnError, type Ast, type AstNode, type RpnToken } from "./types.js";

export function build(rpn: readonly RpnToken[]): Ast {
  const stack: AstNode[] = [];

  rpn.forEach((token, index) => {
    if (token.type !== "OPERATOR") {
      stack.push({ kind: "number", value: token });
      return;
    }

    const right = stack.pop();
    const left = stack.pop();
    if (!left || !right) {
      throw new MalformedRpnError(`Operator '${token.value}' at ${index} needs two operands`, index);
    }

    const node: AstNode = { kind: "binary", op: token.value, left, right };
    stack.push(node);
    traceLog("AST", formatAst(node), { index, depth: stack.length });
  });

  if (stack.length === 0) return { kind: "empty" };
  if (stack.length > 1) {
    throw new MalformedRpnError(`RPN leaves ${stack.length} operands without an operator`, rpn.length);
  }
  return stack[0] ?? { kind: "empty" };
}
