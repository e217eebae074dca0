import binaryen from "binaryen";

/** A materialized IR value: a binaryen expression of type f64. */
export type IRValue = binaryen.ExpressionRef;

export const valueType: binaryen.Type = binaryen.f64;

export interface IRFunction {
  name: string;
  arity: number;
  imported: boolean;
}

/** Shared settings of one compilation unit. */
export interface IRContext {
  name: string;
  valueType: binaryen.Type;
}

export type Opcode = "add" | "sub" | "call";

export interface Instruction {
  op: Opcode;
  ref: IRValue;
  operands: IRValue[];
  target?: string;
}

const paramsOf = (arity: number): binaryen.Type =>
  binaryen.createType(new Array<binaryen.Type>(arity).fill(valueType));

/** The module that accumulates every definition of a compilation unit. */
export class IRModule {
  private mod: binaryen.Module;
  private anonCount = 0;

  constructor() {
    this.mod = new binaryen.Module();
  }

  public raw = (): binaryen.Module => this.mod;

  private describe = (ref: binaryen.FunctionRef): IRFunction => {
    const info = binaryen.getFunctionInfo(ref);
    return {
      name: info.name,
      arity: binaryen.expandType(info.params).length,
      imported: Boolean(info.module),
    };
  };

  public lookupFunction = (name: string): IRFunction | null => {
    const ref = this.mod.getFunction(name);
    return ref ? this.describe(ref) : null;
  };

  /** Declares a host function `name` taking `arity` numbers and returning one. */
  public declareFunction = (name: string, arity: number): IRFunction => {
    this.mod.addFunctionImport(name, "env", name, paramsOf(arity), valueType);
    return { name, arity, imported: true };
  };

  /** Wraps `body` in a fresh exported, parameterless function and returns its name. */
  public defineAnonymous = (body: IRValue): string => {
    const name = `__anon_expr${this.anonCount++}`;
    this.mod.addFunction(name, binaryen.none, valueType, [], body);
    this.mod.addFunctionExport(name, name);
    return name;
  };

  public bodyOf = (name: string): IRValue | null => {
    const ref = this.mod.getFunction(name);
    if (!ref) return null;
    const body = binaryen.getFunctionInfo(ref).body;
    return body ? body : null;
  };

  public copy = (value: IRValue): IRValue => this.mod.copyExpression(value);

  public print = (): string => this.mod.emitText();

  public verify = (): boolean => this.mod.validate() !== 0;

  public dispose = (): void => {
    this.mod.dispose();
  };
}

/** Emits instructions into the module and keeps them, in order, at its insertion point. */
export class IRBuilder {
  private emitted: Instruction[] = [];

  constructor(private module: IRModule) {}

  private record = (instr: Instruction): IRValue => {
    this.emitted.push(instr);
    return instr.ref;
  };

  public constant = (value: number): IRValue =>
    this.module.raw().f64.const(value);

  public add = (left: IRValue, right: IRValue): IRValue =>
    this.record({
      op: "add",
      ref: this.module.raw().f64.add(left, right),
      operands: [left, right],
    });

  public sub = (left: IRValue, right: IRValue): IRValue =>
    this.record({
      op: "sub",
      ref: this.module.raw().f64.sub(left, right),
      operands: [left, right],
    });

  public call = (target: string, args: IRValue[]): IRValue =>
    this.record({
      op: "call",
      ref: this.module.raw().call(target, args, valueType),
      operands: args,
      target,
    });

  public instructions = (): readonly Instruction[] => this.emitted;
}

/** Text form of a single value. */
export const printValue = (value: IRValue): string => binaryen.emitText(value);
