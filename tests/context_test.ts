import binaryen from "binaryen";
import { expect, test } from "vitest";
import { CodegenContext } from "../src/codegen/context.js";
import { SymbolTable } from "../src/codegen/symbols.js";
import { CodegenConfigError } from "../src/errors.js";

test("Context", () => {
  const ctx = new CodegenContext();
  expect(ctx.initialized()).toBe(false);
  expect(() => ctx.builder()).toThrow(CodegenConfigError);
  expect(() => ctx.module()).toThrow("codegen context used before initialize()");

  ctx.initialize("unit");
  expect(ctx.context()).toEqual({ name: "unit", valueType: binaryen.f64 });
  expect(() => ctx.initialize()).toThrow(
    "codegen context 'unit' is already initialized",
  );

  ctx.dispose();
  expect(ctx.initialized()).toBe(false);
  expect(() => ctx.context()).toThrow(CodegenConfigError);

  ctx.initialize();
  expect(ctx.context().name).toBe("lagoon");
  ctx.dispose();
});

test("SymbolTable", () => {
  const ctx = new CodegenContext();
  ctx.initialize();
  const symbols = new SymbolTable();
  const value = ctx.builder().constant(1);
  symbols.define("test", value);
  expect(symbols.lookup("test")).toBe(value);
  expect(symbols.lookup("missing")).toBeUndefined();
  expect(symbols.has("test")).toBe(true);
  ctx.dispose();
});
