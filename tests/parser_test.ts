import { expect, test } from "vitest";
import { Lexer } from "../src/lexer.js";
import { Parser } from "../src/parser.js";
import { TokenType } from "../src/token.js";

const parseExpr = (code: string, precedence?: Record<string, number>) =>
  new Parser(new Lexer(code), { precedence }).parseExpression();

test("Parser", () => {
  const lexer = new Lexer("extern sqrt(x); sqrt(4); 1 + 2");
  const parser = new Parser(lexer);
  expect(parser.parse()).toEqual({
    t: "ok",
    v: {
      type: "Program",
      body: [
        { type: "Extern", name: "sqrt", params: ["x"] },
        { type: "Call", callee: "sqrt", args: [{ type: "Number", value: 4 }] },
        {
          type: "BinOp",
          op: "+",
          left: { type: "Number", value: 1 },
          right: { type: "Number", value: 2 },
        },
      ],
    },
  });
});

test("Parser is left associative", () => {
  expect(parseExpr("9 - 3 - 2")).toEqual({
    t: "ok",
    v: {
      type: "BinOp",
      op: "-",
      left: {
        type: "BinOp",
        op: "-",
        left: { type: "Number", value: 9 },
        right: { type: "Number", value: 3 },
      },
      right: { type: "Number", value: 2 },
    },
  });
});

test("Parser groups and calls", () => {
  expect(parseExpr("a - (f() + g(b, 2))")).toEqual({
    t: "ok",
    v: {
      type: "BinOp",
      op: "-",
      left: { type: "Var", name: "a" },
      right: {
        type: "BinOp",
        op: "+",
        left: { type: "Call", callee: "f", args: [] },
        right: {
          type: "Call",
          callee: "g",
          args: [{ type: "Var", name: "b" }, { type: "Number", value: 2 }],
        },
      },
    },
  });
});

test("Parser precedence table can be extended", () => {
  expect(parseExpr("1 + 2 * 3", { "*": 20 })).toEqual({
    t: "ok",
    v: {
      type: "BinOp",
      op: "+",
      left: { type: "Number", value: 1 },
      right: {
        type: "BinOp",
        op: "*",
        left: { type: "Number", value: 2 },
        right: { type: "Number", value: 3 },
      },
    },
  });
  // without an entry, '*' ends the expression
  expect(parseExpr("2 * 3")).toEqual({ t: "ok", v: { type: "Number", value: 2 } });
});

test("Parser reports unterminated calls", () => {
  expect(parseExpr("f(1, 2")).toEqual({
    t: "err",
    e: { kind: "UnterminatedCall", callee: "f", found: { type: TokenType.EOF, pos: 6 } },
  });
  expect(parseExpr("f(1 2)")).toEqual({
    t: "err",
    e: {
      kind: "UnexpectedToken",
      expected: "',' or ')'",
      found: { type: TokenType.NUMBER, value: 2, pos: 4 },
    },
  });
});

test("Parser reports unterminated groups", () => {
  expect(parseExpr("(1 + 2")).toEqual({
    t: "err",
    e: { kind: "UnterminatedGroup", found: { type: TokenType.EOF, pos: 6 } },
  });
  expect(parseExpr("(1 + 2,")).toEqual({
    t: "err",
    e: {
      kind: "UnexpectedToken",
      expected: "')'",
      found: { type: TokenType.COMMA, pos: 6 },
    },
  });
});

test("Parser rejects tokens that cannot start an expression", () => {
  expect(parseExpr(")")).toEqual({
    t: "err",
    e: { kind: "UnexpectedToken", expected: "expression", found: { type: TokenType.RPAREN, pos: 0 } },
  });
  expect(new Parser(new Lexer("def f(x) x")).parse()).toEqual({
    t: "err",
    e: { kind: "UnexpectedToken", expected: "expression", found: { type: TokenType.DEF, pos: 0 } },
  });
  expect(parseExpr("1 + 1.2.3")).toEqual({
    t: "err",
    e: { kind: "MalformedNumber", text: "1.2.3", pos: 4 },
  });
});

test("Parser extern errors", () => {
  expect(new Parser(new Lexer("extern (x)")).next()).toEqual({
    t: "err",
    e: {
      kind: "UnexpectedToken",
      expected: "function name",
      found: { type: TokenType.LPAREN, pos: 7 },
    },
  });
  expect(new Parser(new Lexer("extern f(x y)")).next()).toEqual({
    t: "err",
    e: {
      kind: "UnexpectedToken",
      expected: "',' or ')'",
      found: { type: TokenType.IDENT, name: "y", pos: 11 },
    },
  });
  expect(new Parser(new Lexer("extern f(x,)")).next()).toEqual({
    t: "err",
    e: {
      kind: "UnexpectedToken",
      expected: "parameter name",
      found: { type: TokenType.RPAREN, pos: 11 },
    },
  });
  expect(new Parser(new Lexer("extern g(); extern h(a, b)")).parse()).toEqual({
    t: "ok",
    v: {
      type: "Program",
      body: [
        { type: "Extern", name: "g", params: [] },
        { type: "Extern", name: "h", params: ["a", "b"] },
      ],
    },
  });
});

test("Parser skips separators and stops at the end", () => {
  const parser = new Parser(new Lexer(";; 7 ;"));
  expect(parser.next()).toEqual({ t: "ok", v: { type: "Number", value: 7 } });
  expect(parser.next()).toEqual({ t: "ok", v: null });
  expect(parser.next()).toEqual({ t: "ok", v: null });
});
