export { Lexer, tokenize } from "./lexer.js";
export { Parser } from "./parser.js";
export { Codegen } from "./codegen/codegen.js";
export { CodegenContext } from "./codegen/context.js";
export { IRBuilder, IRModule } from "./codegen/ir.js";
export { SymbolTable } from "./codegen/symbols.js";
export { Evaluator } from "./codegen/evaluator.js";
export { Driver, listing, parseDefines, parseSource } from "./driver.js";
export { CodegenConfigError, formatError } from "./errors.js";
export { TokenType } from "./token.js";
export type {
  BinOp,
  Call,
  Expression,
  Extern,
  NumberLit,
  Program,
  TopLevel,
  Var,
} from "./ast.js";
export type {
  CompileError,
  EvalError,
  LexError,
  LowerError,
  ParseError,
  SourceError,
} from "./errors.js";
export type { Token } from "./token.js";
export type { IRContext, IRFunction, IRValue, Instruction } from "./codegen/ir.js";
export type { ParserOptions } from "./parser.js";
export type { CompiledItem, DriverOptions } from "./driver.js";
export type { Result } from "./result.js";
