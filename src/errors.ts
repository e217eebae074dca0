import { describeToken, type Token } from "./token.js";

export type LexError = { kind: "MalformedNumber"; text: string; pos: number };

export type ParseError =
  | { kind: "UnexpectedToken"; expected: string; found: Token }
  | { kind: "UnterminatedCall"; callee: string; found: Token }
  | { kind: "UnterminatedGroup"; found: Token };

export type LowerError =
  | { kind: "UnknownVariable"; name: string }
  | { kind: "UnknownFunction"; name: string }
  | { kind: "ArityMismatch"; name: string; expected: number; found: number }
  | { kind: "UnsupportedOperator"; op: string };

export type EvalError =
  | { kind: "MissingNative"; name: string }
  | { kind: "UnsupportedInstruction"; id: number };

/** Anything the parser can fail with: its own errors plus lexer errors it surfaces. */
export type SourceError = LexError | ParseError;

export type CompileError =
  | { stage: "parse"; error: SourceError }
  | { stage: "lower"; error: LowerError };

/** Thrown when the codegen context is used outside its lifecycle. */
export class CodegenConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodegenConfigError";
  }
}

const describe = (e: SourceError | LowerError | EvalError): string => {
  switch (e.kind) {
    case "MalformedNumber":
      return `malformed number '${e.text}' at offset ${e.pos}`;
    case "UnexpectedToken":
      return `expected ${e.expected}, found ${describeToken(e.found)} at offset ${e.found.pos}`;
    case "UnterminatedCall":
      return `call to '${e.callee}' is missing ')', found ${describeToken(e.found)}`;
    case "UnterminatedGroup":
      return `group is missing ')', found ${describeToken(e.found)}`;
    case "UnknownVariable":
      return `unknown variable '${e.name}'`;
    case "UnknownFunction":
      return `unknown function '${e.name}'`;
    case "ArityMismatch":
      return `function '${e.name}' expects ${e.expected} arguments, got ${e.found}`;
    case "UnsupportedOperator":
      return `unsupported operator '${e.op}'`;
    case "MissingNative":
      return `no native implementation for '${e.name}'`;
    case "UnsupportedInstruction":
      return `cannot evaluate expression id ${e.id}`;
  }
};

const lexKinds: ReadonlySet<string> = new Set(["MalformedNumber"]);
const parseKinds: ReadonlySet<string> = new Set([
  "UnexpectedToken",
  "UnterminatedCall",
  "UnterminatedGroup",
]);
const evalKinds: ReadonlySet<string> = new Set([
  "MissingNative",
  "UnsupportedInstruction",
]);

const family = (kind: string): string => {
  if (lexKinds.has(kind)) return "LexError";
  if (parseKinds.has(kind)) return "ParseError";
  if (evalKinds.has(kind)) return "EvalError";
  return "LowerError";
};

/** `Family(Kind): message`, as printed by the CLI. */
export const formatError = (e: SourceError | LowerError | EvalError): string =>
  `${family(e.kind)}(${e.kind}): ${describe(e)}`;
