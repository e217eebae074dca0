import { type Token, TokenType } from "./token.js";
import { isalnum, isalpha, isdigit } from "./utils.js";

const keywords = new Map<string, TokenType.DEF | TokenType.EXTERN>([
  ["def", TokenType.DEF],
  ["extern", TokenType.EXTERN],
]);

const punctuation = new Map<
  string,
  | TokenType.OP_ADD
  | TokenType.OP_SUB
  | TokenType.LPAREN
  | TokenType.RPAREN
  | TokenType.COMMA
  | TokenType.SEMICOLON
>([
  ["+", TokenType.OP_ADD],
  ["-", TokenType.OP_SUB],
  ["(", TokenType.LPAREN],
  [")", TokenType.RPAREN],
  [",", TokenType.COMMA],
  [";", TokenType.SEMICOLON],
]);

/** True for words the lexer reserves and never produces as identifiers. */
export const isKeyword = (word: string): boolean => keywords.has(word);

/**Lexer */
export class Lexer {
  private pos: number;
  private tok: Token;

  constructor(private src: string) {
    this.pos = 0;
    this.tok = { type: TokenType.EOF, pos: 0 };
  }

  private current = (): string =>
    this.pos < this.src.length ? this.src[this.pos] : "\0";

  private bump = (): void => {
    this.pos++;
  };

  private skipSpaces = (): void => {
    while (
      this.current() === " " || this.current() === "\t" ||
      this.current() === "\n" || this.current() === "\r"
    ) this.bump();
  };

  private atEnd = (): boolean => this.pos >= this.src.length;

  private skipComment = (): void => {
    while (
      !this.atEnd() && this.current() !== "\n" && this.current() !== "\r"
    ) this.bump();
  };

  private parseNumber = (start: number): Token => {
    let text = "";
    let dots = 0;
    while (isdigit(this.current()) || this.current() === ".") {
      if (this.current() === ".") dots++;
      text += this.current();
      this.bump();
    }
    if (dots > 1 || text === ".") {
      return {
        type: TokenType.INVALID,
        error: { kind: "MalformedNumber", text, pos: start },
        pos: start,
      };
    }
    return { type: TokenType.NUMBER, value: parseFloat(text), pos: start };
  };

  private parseAlpha = (): string => {
    let alpha = "";
    while (isalnum(this.current())) {
      alpha += this.current();
      this.bump();
    }
    return alpha;
  };

  private scan = (): Token => {
    this.skipSpaces();
    const start = this.pos;
    const ch = this.current();

    if (this.atEnd()) {
      return { type: TokenType.EOF, pos: start };
    }
    if (ch === "#") {
      this.skipComment();
      return this.scan();
    }
    if (isalpha(ch)) {
      const ident = this.parseAlpha();
      const keyword = keywords.get(ident);
      if (keyword !== undefined) return { type: keyword, pos: start };
      return { type: TokenType.IDENT, name: ident, pos: start };
    }
    if (isdigit(ch) || ch === ".") {
      return this.parseNumber(start);
    }

    this.bump();
    const single = punctuation.get(ch);
    if (single !== undefined) return { type: single, pos: start };
    return { type: TokenType.UNKNOWN, char: ch, pos: start };
  };

  /** Advances past the current token and returns the new one. Keeps returning EOF at the end. */
  public nextToken = (): Token => {
    this.tok = this.scan();
    return this.tok;
  };

  public currentToken = (): Token => {
    return this.tok;
  };
}

/** Every token of `src`, ending with the first EOF. */
export const tokenize = (src: string): Token[] => {
  const lexer = new Lexer(src);
  const tokens: Token[] = [];
  do {
    tokens.push(lexer.nextToken());
  } while (lexer.currentToken().type !== TokenType.EOF);
  return tokens;
};
