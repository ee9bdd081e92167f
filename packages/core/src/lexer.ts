/**
 * Lexer using Chevrotain.
 *
 * Chevrotain scans the whole text up front and collects errors instead of
 * throwing; tokens are converted to language tokens one at a time as the
 * parser pulls them.
 */
import { createToken, Lexer as ChevrotainLexer, type IToken, type TokenType } from "chevrotain";
import type { Span } from "./expr.js";
import { I64_MAX, I64_MIN } from "./expr.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import type { Source } from "./source.js";

// Characters that end an identifier
const NAME_CHARS = "[^\\s()\\[\\]{}\"';]";

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: ChevrotainLexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: ChevrotainLexer.SKIPPED,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /;[^\n\r]*/,
  group: ChevrotainLexer.SKIPPED,
});

export const BlockOpen = createToken({ name: "BlockOpen", pattern: /\(/ });
export const BlockClose = createToken({ name: "BlockClose", pattern: /\)/ });
export const ListOpen = createToken({ name: "ListOpen", pattern: /\[/ });
export const ListClose = createToken({ name: "ListClose", pattern: /\]/ });

// A literal must end where a name would: `1abc` is an error, not `1` then `abc`.
export const FloatLit = createToken({
  name: "FloatLit",
  pattern: new RegExp(`-?\\d+\\.\\d*(?:[eE][+-]?\\d+)?(?!${NAME_CHARS})`),
});
export const IntLit = createToken({
  name: "IntLit",
  pattern: new RegExp(`-?\\d+(?!${NAME_CHARS})`),
});
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\\u0000-\u001f]|\\["\\/bfnrt]|\\u[0-9a-fA-F]{4})*"/,
});
export const SymbolLit = createToken({
  name: "SymbolLit",
  pattern: new RegExp(`'${NAME_CHARS}+`),
});

export const Ident = createToken({
  name: "Ident",
  pattern: new RegExp(`(?!\\d)${NAME_CHARS}+`),
});
export const Nil = createToken({ name: "Nil", pattern: /nil/, longer_alt: Ident });

// Order matters: literals before identifiers, `nil` before Ident
export const allTokens: TokenType[] = [
  WhiteSpace,
  Newline,
  Comment,
  BlockOpen,
  BlockClose,
  ListOpen,
  ListClose,
  FloatLit,
  IntLit,
  StringLit,
  SymbolLit,
  Nil,
  Ident,
];

export const StackLexer = new ChevrotainLexer(allTokens, { positionTracking: "full" });

export type Token =
  | { kind: "Integer"; value: bigint; span: Span }
  | { kind: "Float"; value: number; span: Span }
  | { kind: "String"; value: string; span: Span }
  | { kind: "Symbol"; name: string; span: Span }
  | { kind: "Call"; name: string; span: Span }
  | { kind: "Nil"; span: Span }
  | { kind: "BlockOpen"; span: Span }
  | { kind: "BlockClose"; span: Span }
  | { kind: "ListOpen"; span: Span }
  | { kind: "ListClose"; span: Span };

export function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: token.startLine ?? 1,
    startCol: token.startColumn ?? 1,
    endLine: token.endLine ?? 1,
    endCol: (token.endColumn ?? 1) + 1,
  };
}

export class Lexer implements Iterable<Token> {
  readonly source: Source;
  readonly diagnostics: Diagnostic[] = [];
  private readonly raw: IToken[];
  private pos = 0;

  constructor(source: Source) {
    this.source = source;
    const result = StackLexer.tokenize(source.content);
    this.raw = result.tokens;
    for (const err of result.errors) {
      this.diagnostics.push(
        makeDiag("E_LEX", err.message, {
          file: source.name,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + err.length,
        })
      );
    }
  }

  /** The next token, or `undefined` at end of input. */
  next(): Token | undefined {
    while (this.pos < this.raw.length) {
      const token = this.convert(this.raw[this.pos++]);
      if (token) return token;
    }
    return undefined;
  }

  *[Symbol.iterator](): Iterator<Token> {
    let token = this.next();
    while (token) {
      yield token;
      token = this.next();
    }
  }

  private convert(raw: IToken): Token | undefined {
    const span = tokenSpan(raw, this.source.name);
    switch (raw.tokenType) {
      case BlockOpen: return { kind: "BlockOpen", span };
      case BlockClose: return { kind: "BlockClose", span };
      case ListOpen: return { kind: "ListOpen", span };
      case ListClose: return { kind: "ListClose", span };
      case Nil: return { kind: "Nil", span };
      case FloatLit: return { kind: "Float", value: Number.parseFloat(raw.image), span };
      case StringLit: return { kind: "String", value: String(JSON.parse(raw.image)), span };
      case SymbolLit: return { kind: "Symbol", name: raw.image.slice(1), span };
      case Ident: return { kind: "Call", name: raw.image, span };
      case IntLit: {
        const value = BigInt(raw.image);
        if (value < I64_MIN || value > I64_MAX) {
          this.diagnostics.push(
            makeDiag("E_INT_RANGE", `Integer literal '${raw.image}' does not fit in 64 bits.`, span)
          );
          return undefined;
        }
        return { kind: "Integer", value, span };
      }
    }
    return undefined;
  }
}

const KeptComment = createToken({ name: "KeptComment", pattern: /;[^\n\r]*/, group: "comments" });

const CommentLexer = new ChevrotainLexer(
  allTokens.map((token) => (token === Comment ? KeptComment : token)),
  { positionTracking: "full" }
);

export interface SourceComment {
  line: number;
  text: string;
}

/** Comments of a source in order, for tools that re-print it. */
export function scanComments(content: string): SourceComment[] {
  const comments = CommentLexer.tokenize(content).groups["comments"] ?? [];
  return comments.map((token) => ({ line: token.startLine ?? 1, text: token.image.trimEnd() }));
}

/** Lexes a whole source eagerly. */
export function lex(source: Source): { tokens: Token[]; diagnostics: Diagnostic[] } {
  const lexer = new Lexer(source);
  const tokens = [...lexer];
  return { tokens, diagnostics: lexer.diagnostics };
}
