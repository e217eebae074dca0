import { expect, test } from "vitest";
import { formatError } from "../src/errors.js";
import { TokenType } from "../src/token.js";

test("formatError", () => {
  expect(formatError({ kind: "UnknownFunction", name: "g" })).toBe(
    "LowerError(UnknownFunction): unknown function 'g'",
  );
  expect(
    formatError({ kind: "UnterminatedCall", callee: "f", found: { type: TokenType.EOF, pos: 6 } }),
  ).toBe("ParseError(UnterminatedCall): call to 'f' is missing ')', found end of input");
  expect(
    formatError({
      kind: "UnexpectedToken",
      expected: "expression",
      found: { type: TokenType.UNKNOWN, char: "$", pos: 2 },
    }),
  ).toBe("ParseError(UnexpectedToken): expected expression, found '$' at offset 2");
  expect(formatError({ kind: "MalformedNumber", text: "1.2.3", pos: 0 })).toBe(
    "LexError(MalformedNumber): malformed number '1.2.3' at offset 0",
  );
  expect(formatError({ kind: "ArityMismatch", name: "f", expected: 2, found: 1 })).toBe(
    "LowerError(ArityMismatch): function 'f' expects 2 arguments, got 1",
  );
  expect(formatError({ kind: "MissingNative", name: "foo" })).toBe(
    "EvalError(MissingNative): no native implementation for 'foo'",
  );
});
