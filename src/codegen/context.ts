import { CodegenConfigError } from "../errors.js";
import { IRBuilder, type IRContext, IRModule, valueType } from "./ir.js";

interface Unit {
  context: IRContext;
  builder: IRBuilder;
  module: IRModule;
}

/** Owns the context, builder and module of one compilation. */
export class CodegenContext {
  private unit: Unit | null = null;

  public initialize = (name = "lagoon"): void => {
    if (this.unit) {
      throw new CodegenConfigError(
        `codegen context '${this.unit.context.name}' is already initialized`,
      );
    }
    const module = new IRModule();
    this.unit = {
      context: { name, valueType },
      builder: new IRBuilder(module),
      module,
    };
  };

  public initialized = (): boolean => this.unit !== null;

  private live = (): Unit => {
    if (!this.unit) {
      throw new CodegenConfigError(
        "codegen context used before initialize()",
      );
    }
    return this.unit;
  };

  public context = (): IRContext => this.live().context;

  public builder = (): IRBuilder => this.live().builder;

  public module = (): IRModule => this.live().module;

  public dispose = (): void => {
    if (!this.unit) return;
    this.unit.module.dispose();
    this.unit = null;
  };
}
