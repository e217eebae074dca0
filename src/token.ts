import type { LexError } from "./errors.js";

export enum TokenType {
  NUMBER,
  IDENT,
  DEF,
  EXTERN,
  OP_ADD,
  OP_SUB,
  LPAREN,
  RPAREN,
  COMMA,
  SEMICOLON,
  UNKNOWN,
  INVALID,
  EOF,
}

type Simple = Exclude<
  TokenType,
  TokenType.NUMBER | TokenType.IDENT | TokenType.UNKNOWN | TokenType.INVALID
>;

export type Token =
  | { type: TokenType.NUMBER; value: number; pos: number }
  | { type: TokenType.IDENT; name: string; pos: number }
  | { type: TokenType.UNKNOWN; char: string; pos: number }
  | { type: TokenType.INVALID; error: LexError; pos: number }
  | { type: Simple; pos: number };

const spelling: Record<Simple, string> = {
  [TokenType.DEF]: "'def'",
  [TokenType.EXTERN]: "'extern'",
  [TokenType.OP_ADD]: "'+'",
  [TokenType.OP_SUB]: "'-'",
  [TokenType.LPAREN]: "'('",
  [TokenType.RPAREN]: "')'",
  [TokenType.COMMA]: "','",
  [TokenType.SEMICOLON]: "';'",
  [TokenType.EOF]: "end of input",
};

/** Human readable form of a token, used in diagnostics. */
export const describeToken = (tok: Token): string => {
  switch (tok.type) {
    case TokenType.NUMBER:
      return `number '${tok.value}'`;
    case TokenType.IDENT:
      return `identifier '${tok.name}'`;
    case TokenType.UNKNOWN:
      return `'${tok.char}'`;
    case TokenType.INVALID:
      return `'${tok.error.text}'`;
    default:
      return spelling[tok.type];
  }
};
