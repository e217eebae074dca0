import type { Program } from "./ast.js";
import { Codegen } from "./codegen/codegen.js";
import { CodegenContext } from "./codegen/context.js";
import { type Instruction, printValue } from "./codegen/ir.js";
import { SymbolTable } from "./codegen/symbols.js";
import { nativeFuncs } from "./core.js";
import type { CompileError, SourceError } from "./errors.js";
import { isKeyword, Lexer } from "./lexer.js";
import { Parser, type ParserOptions } from "./parser.js";
import { err, isErr, ok, type Result } from "./result.js";

export interface DriverOptions extends ParserOptions {
  /** Module name. */
  name?: string;
  /** Variables bound to constants before compilation. */
  defines?: Record<string, number>;
  /** Declare every native function as an extern up front. */
  natives?: boolean;
  /** Verbose sink; silent when absent. */
  log?: (line: string) => void;
}

export type CompiledItem =
  | { kind: "expr"; fn: string }
  | { kind: "extern"; name: string; arity: number };

/**
 * Runs lexer, parser and codegen over one compilation unit. The driver owns
 * the codegen context; call `dispose()` when the module is no longer needed.
 */
export class Driver {
  public readonly ctx = new CodegenContext();
  public readonly symbols = new SymbolTable();
  private codegen: Codegen;
  private compiled: CompiledItem[] = [];
  private log: (line: string) => void;

  constructor(private options: DriverOptions = {}) {
    this.log = options.log ?? (() => {});
    this.ctx.initialize(options.name);
    this.codegen = new Codegen(this.ctx);

    const builder = this.ctx.builder();
    for (const [name, value] of Object.entries(options.defines ?? {})) {
      this.symbols.define(name, builder.constant(value));
    }
    if (options.natives) {
      for (const [name, native] of Object.entries(nativeFuncs)) {
        this.ctx.module().declareFunction(name, native.arity);
      }
    }
  }

  /**
   * Compiles `src` item by item. Stops at the first error; whatever was
   * emitted before it stays in the module.
   */
  public compile = (src: string): Result<CompiledItem[], CompileError> => {
    const parser = new Parser(new Lexer(src), this.options);
    const emitted: CompiledItem[] = [];

    while (true) {
      const parsed = parser.next();
      if (isErr(parsed)) return err<CompileError>({ stage: "parse", error: parsed.e });
      const item = parsed.v;
      if (item === null) break;

      if (item.type === "Extern") {
        const declared = this.codegen.declare(item);
        if (isErr(declared)) return err<CompileError>({ stage: "lower", error: declared.e });
        this.log(`extern ${declared.v.name}/${declared.v.arity}`);
        this.emit(emitted, { kind: "extern", name: declared.v.name, arity: declared.v.arity });
        continue;
      }

      const lowered = this.codegen.emitTopLevel(item, this.symbols);
      if (isErr(lowered)) return err<CompileError>({ stage: "lower", error: lowered.e });
      this.log(`${lowered.v.name}: ${printValue(lowered.v.value).trim()}`);
      this.emit(emitted, { kind: "expr", fn: lowered.v.name });
    }

    return ok(emitted);
  };

  private emit = (batch: CompiledItem[], item: CompiledItem): void => {
    batch.push(item);
    this.compiled.push(item);
  };

  /** Everything emitted so far, including items from a compile that later failed. */
  public items = (): readonly CompiledItem[] => this.compiled;

  public instructions = (): readonly Instruction[] => this.ctx.builder().instructions();

  public print = (): string => this.ctx.module().print();

  public verify = (): boolean => this.ctx.module().verify();

  public dispose = (): void => {
    this.ctx.dispose();
  };
}

/** Parses a whole source file without lowering it. */
export const parseSource = (
  src: string,
  options: ParserOptions = {},
): Result<Program, SourceError> => new Parser(new Lexer(src), options).parse();

/** One line per emitted instruction, in emission order. */
export const listing = (instructions: readonly Instruction[]): string[] =>
  instructions.map((instr, i) => {
    const head = `${i.toString().padStart(4, "0")}: ${instr.op.padEnd(5)}`;
    const operands = instr.operands.length;
    return instr.target === undefined
      ? `${head} (${operands} operands)`
      : `${head} ${instr.target} (${operands} operands)`;
  });

/** Parses `name=value` pairs given on the command line. */
export const parseDefines = (
  pairs: readonly string[],
): Result<Record<string, number>, string> => {
  const defines: Record<string, number> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    const name = eq === -1 ? "" : pair.slice(0, eq).trim();
    const raw = eq === -1 ? "" : pair.slice(eq + 1).trim();
    if (
      !/^[A-Za-z][A-Za-z0-9]*$/.test(name) || isKeyword(name) ||
      !/^[+-]?(\d+\.?\d*|\.\d+)$/.test(raw)
    ) {
      return err(`invalid define '${pair}', expected name=number`);
    }
    defines[name] = parseFloat(raw);
  }
  return ok(defines);
};
