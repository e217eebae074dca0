import binaryen from "binaryen";
import { type NativeFunc, nativeFuncs } from "../core.js";
import type { EvalError } from "../errors.js";
import { err, isErr, ok, type Result } from "../result.js";
import type { IRModule, IRValue } from "./ir.js";

type Evaluated = Result<number, EvalError>;

const fail = (e: EvalError): Result<never, EvalError> => err(e);

const isConst = (
  info: binaryen.ExpressionInfo,
): info is binaryen.ConstInfo => info.id === binaryen.ConstId;

const isBinary = (
  info: binaryen.ExpressionInfo,
): info is binaryen.BinaryInfo => info.id === binaryen.BinaryId;

const isCall = (
  info: binaryen.ExpressionInfo,
): info is binaryen.CallInfo => info.id === binaryen.CallId;

/** Concrete evaluation of lowered f64 expressions. */
export class Evaluator {
  constructor(
    private module: IRModule,
    private natives: Record<string, NativeFunc> = nativeFuncs,
  ) {}

  /** Runs the parameterless function `name`. */
  public run = (name: string): Evaluated => {
    const body = this.module.bodyOf(name);
    if (body !== null) return this.evaluate(body);
    return this.callNative(name, []);
  };

  public evaluate = (expr: IRValue): Evaluated => {
    const info = binaryen.getExpressionInfo(expr);

    if (isConst(info)) {
      if (typeof info.value !== "number") {
        return fail({ kind: "UnsupportedInstruction", id: info.id });
      }
      return ok(info.value);
    }

    if (isBinary(info)) {
      const left = this.evaluate(info.left);
      if (isErr(left)) return left;
      const right = this.evaluate(info.right);
      if (isErr(right)) return right;
      switch (info.op) {
        case binaryen.AddFloat64:
          return ok(left.v + right.v);
        case binaryen.SubFloat64:
          return ok(left.v - right.v);
        default:
          return fail({ kind: "UnsupportedInstruction", id: info.id });
      }
    }

    if (isCall(info)) {
      const args: number[] = [];
      for (const operand of info.operands) {
        const value = this.evaluate(operand);
        if (isErr(value)) return value;
        args.push(value.v);
      }
      const body = this.module.bodyOf(info.target);
      if (body !== null && args.length === 0) return this.evaluate(body);
      return this.callNative(info.target, args);
    }

    return fail({ kind: "UnsupportedInstruction", id: info.id });
  };

  private callNative = (name: string, args: number[]): Evaluated => {
    const native = Object.hasOwn(this.natives, name) ? this.natives[name] : undefined;
    if (native === undefined) return fail({ kind: "MissingNative", name });
    return ok(native.fn(...args));
  };
}
