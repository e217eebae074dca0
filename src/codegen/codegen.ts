import type { Expression, Extern } from "../ast.js";
import type { LowerError } from "../errors.js";
import { err, isErr, ok, type Result } from "../result.js";
import type { CodegenContext } from "./context.js";
import type { IRFunction, IRValue } from "./ir.js";
import type { SymbolTable } from "./symbols.js";

type Lowered<T> = Result<T, LowerError>;

const fail = (e: LowerError): Lowered<never> => err(e);

/** Lowers AST nodes into the context's module. */
export class Codegen {
  constructor(private ctx: CodegenContext) {}

  /**
   * Lowers `node` bottom-up. Every successful call appends instructions, so
   * lowering the same node twice emits two independent copies.
   */
  public lower = (node: Expression, symbols: SymbolTable): Lowered<IRValue> => {
    const builder = this.ctx.builder();

    switch (node.type) {
      case "Number": {
        return ok(builder.constant(node.value));
      }
      case "Var": {
        const value = symbols.lookup(node.name);
        if (value === undefined) {
          return fail({ kind: "UnknownVariable", name: node.name });
        }
        // a binaryen expression may only have one parent
        return ok(this.ctx.module().copy(value));
      }
      case "BinOp": {
        const left = this.lower(node.left, symbols);
        if (isErr(left)) return left;
        const right = this.lower(node.right, symbols);
        if (isErr(right)) return right;

        switch (node.op) {
          case "+":
            return ok(builder.add(left.v, right.v));
          case "-":
            return ok(builder.sub(left.v, right.v));
          default:
            return fail({ kind: "UnsupportedOperator", op: node.op });
        }
      }
      case "Call": {
        // arguments first, then the callee
        const args: IRValue[] = [];
        for (const arg of node.args) {
          const value = this.lower(arg, symbols);
          if (isErr(value)) return value;
          args.push(value.v);
        }

        const func = this.ctx.module().lookupFunction(node.callee);
        if (func === null) {
          return fail({ kind: "UnknownFunction", name: node.callee });
        }
        if (func.arity !== args.length) {
          return fail({
            kind: "ArityMismatch",
            name: node.callee,
            expected: func.arity,
            found: args.length,
          });
        }
        return ok(builder.call(func.name, args));
      }
      default: {
        const unreachable: never = node;
        return unreachable;
      }
    }
  };

  /** Declares an extern. Redeclaring with the same arity returns the existing function. */
  public declare = (proto: Extern): Lowered<IRFunction> => {
    const module = this.ctx.module();
    const existing = module.lookupFunction(proto.name);
    if (existing) {
      if (existing.arity !== proto.params.length) {
        return fail({
          kind: "ArityMismatch",
          name: proto.name,
          expected: existing.arity,
          found: proto.params.length,
        });
      }
      return ok(existing);
    }
    return ok(module.declareFunction(proto.name, proto.params.length));
  };

  /** Lowers a top-level expression into its own anonymous function and returns that function's name. */
  public emitTopLevel = (
    expr: Expression,
    symbols: SymbolTable,
  ): Lowered<{ name: string; value: IRValue }> => {
    const value = this.lower(expr, symbols);
    if (isErr(value)) return value;
    const name = this.ctx.module().defineAnonymous(value.v);
    return ok({ name, value: value.v });
  };
}
