import type { Expression, Extern, Program, TopLevel } from "./ast.js";
import type { SourceError } from "./errors.js";
import type { Lexer } from "./lexer.js";
import { err, isErr, ok, type Result } from "./result.js";
import { type Token, TokenType } from "./token.js";

/** Binary operator precedence. Higher binds tighter; all operators are left associative. */
export const defaultPrecedence: Readonly<Record<string, number>> = {
  "+": 10,
  "-": 10,
};

export interface ParserOptions {
  /** Extra or overriding operators. Single characters other than `+`/`-` arrive as unknown tokens. */
  precedence?: Record<string, number>;
}

type Parsed<T> = Result<T, SourceError>;

const fail = (e: SourceError): Parsed<never> => err(e);

/**Parser */
export class Parser {
  private lexer: Lexer;
  private precedence: Map<string, number>;

  constructor(lexer: Lexer, options: ParserOptions = {}) {
    this.lexer = lexer;
    this.precedence = new Map(
      Object.entries({ ...defaultPrecedence, ...options.precedence }),
    );
    this.lexer.nextToken();
  }

  private current = (): Token => this.lexer.currentToken();

  private advance = (): void => {
    this.lexer.nextToken();
  };

  public parse = (): Parsed<Program> => {
    const body: TopLevel[] = [];
    while (true) {
      const item = this.next();
      if (isErr(item)) return item;
      if (item.v === null) break;
      body.push(item.v);
    }
    return ok<Program>({ type: "Program", body });
  };

  /** One top-level item, skipping separators. `null` once the input is exhausted. */
  public next = (): Parsed<TopLevel | null> => {
    while (this.current().type === TokenType.SEMICOLON) this.advance();
    switch (this.current().type) {
      case TokenType.EOF:
        return ok(null);
      case TokenType.EXTERN:
        return this.extern();
      default:
        return this.parseExpression();
    }
  };

  public parseExpression = (): Parsed<Expression> => {
    const lhs = this.primary();
    if (isErr(lhs)) return lhs;
    return this.binaryRhs(0, lhs.v);
  };

  private operatorOf = (tok: Token): string | null => {
    switch (tok.type) {
      case TokenType.OP_ADD:
        return "+";
      case TokenType.OP_SUB:
        return "-";
      case TokenType.UNKNOWN:
        return tok.char;
      default:
        return null;
    }
  };

  private precedenceOf = (tok: Token): number => {
    const op = this.operatorOf(tok);
    if (op === null) return -1;
    return this.precedence.get(op) ?? -1;
  };

  private binaryRhs = (
    minPrec: number,
    lhs: Expression,
  ): Parsed<Expression> => {
    let left = lhs;
    while (true) {
      const tok = this.current();
      const prec = this.precedenceOf(tok);
      const op = this.operatorOf(tok);
      if (prec < minPrec || op === null) return ok(left);
      this.advance();

      const primary = this.primary();
      if (isErr(primary)) return primary;
      let right = primary.v;

      if (prec < this.precedenceOf(this.current())) {
        const tighter = this.binaryRhs(prec + 1, right);
        if (isErr(tighter)) return tighter;
        right = tighter.v;
      }

      left = { type: "BinOp", op, left, right };
    }
  };

  private primary = (): Parsed<Expression> => {
    const tok = this.current();
    switch (tok.type) {
      case TokenType.NUMBER: {
        this.advance();
        return ok<Expression>({ type: "Number", value: tok.value });
      }
      case TokenType.IDENT: {
        this.advance();
        if (this.current().type === TokenType.LPAREN) return this.call(tok.name);
        return ok<Expression>({ type: "Var", name: tok.name });
      }
      case TokenType.LPAREN:
        return this.group();
      case TokenType.INVALID:
        return fail(tok.error);
      default:
        return fail({ kind: "UnexpectedToken", expected: "expression", found: tok });
    }
  };

  private call = (callee: string): Parsed<Expression> => {
    this.advance();
    const args: Expression[] = [];
    if (this.current().type === TokenType.RPAREN) {
      this.advance();
      return ok<Expression>({ type: "Call", callee, args });
    }

    while (true) {
      if (this.current().type === TokenType.EOF) {
        return fail({ kind: "UnterminatedCall", callee, found: this.current() });
      }
      const arg = this.parseExpression();
      if (isErr(arg)) return arg;
      args.push(arg.v);

      const tok = this.current();
      if (tok.type === TokenType.RPAREN) {
        this.advance();
        return ok<Expression>({ type: "Call", callee, args });
      }
      if (tok.type === TokenType.EOF) {
        return fail({ kind: "UnterminatedCall", callee, found: tok });
      }
      if (tok.type !== TokenType.COMMA) {
        return fail({ kind: "UnexpectedToken", expected: "',' or ')'", found: tok });
      }
      this.advance();
    }
  };

  private group = (): Parsed<Expression> => {
    this.advance();
    if (this.current().type === TokenType.EOF) {
      return fail({ kind: "UnterminatedGroup", found: this.current() });
    }
    const inner = this.parseExpression();
    if (isErr(inner)) return inner;

    const tok = this.current();
    if (tok.type === TokenType.EOF) {
      return fail({ kind: "UnterminatedGroup", found: tok });
    }
    if (tok.type !== TokenType.RPAREN) {
      return fail({ kind: "UnexpectedToken", expected: "')'", found: tok });
    }
    this.advance();
    return inner;
  };

  // extern name(a, b)
  private extern = (): Parsed<Extern> => {
    this.advance();
    const nameTok = this.current();
    if (nameTok.type !== TokenType.IDENT) {
      return fail({ kind: "UnexpectedToken", expected: "function name", found: nameTok });
    }
    this.advance();
    if (this.current().type !== TokenType.LPAREN) {
      return fail({ kind: "UnexpectedToken", expected: "'('", found: this.current() });
    }
    this.advance();

    const params: string[] = [];
    while (true) {
      const tok = this.current();
      if (tok.type === TokenType.RPAREN && params.length === 0) break;
      if (tok.type !== TokenType.IDENT) {
        return fail({ kind: "UnexpectedToken", expected: "parameter name", found: tok });
      }
      params.push(tok.name);
      this.advance();
      const sep = this.current();
      if (sep.type === TokenType.RPAREN) break;
      if (sep.type !== TokenType.COMMA) {
        return fail({ kind: "UnexpectedToken", expected: "',' or ')'", found: sep });
      }
      // a comma must be followed by another name
      this.advance();
    }
    this.advance();
    return ok<Extern>({ type: "Extern", name: nameTok.name, params });
  };
}
