import type { IRValue } from "./ir.js";

/** Variable name to materialized value, for one compilation unit. Entries are never removed. */
export class SymbolTable {
  private vars = new Map<string, IRValue>();

  public define = (name: string, value: IRValue): void => {
    this.vars.set(name, value);
  };

  public lookup = (name: string): IRValue | undefined => this.vars.get(name);

  public has = (name: string): boolean => this.vars.has(name);

  public names = (): string[] => [...this.vars.keys()];
}
