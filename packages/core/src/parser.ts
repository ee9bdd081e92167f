/**
 * Parser: tokens to an ordered sequence of expressions.
 *
 * A stack of open frames tracks nesting; each closer must match the innermost
 * opener. Any failure (lexer diagnostics included) yields no expressions.
 */
import type { Expr, Span } from "./expr.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { Lexer, type Token } from "./lexer.js";
import { Source } from "./source.js";

export interface ParseResult {
  exprs: Expr[];
  diagnostics: Diagnostic[];
}

type FrameKind = "block" | "list";

interface Frame {
  kind: FrameKind;
  open: Span;
  exprs: Expr[];
}

const CLOSER: Record<FrameKind, string> = { block: ")", list: "]" };

function literal(token: Token): Expr {
  switch (token.kind) {
    case "Integer": return { kind: "Integer", value: token.value, span: token.span };
    case "Float": return { kind: "Float", value: token.value, span: token.span };
    case "String": return { kind: "String", value: token.value, span: token.span };
    case "Symbol": return { kind: "Symbol", name: token.name, span: token.span };
    case "Nil": return { kind: "Nil", span: token.span };
    case "Call":
      switch (token.name) {
        case "true": return { kind: "Boolean", value: true, span: token.span };
        case "false": return { kind: "Boolean", value: false, span: token.span };
        case "_": return { kind: "Underscore", span: token.span };
        default: return { kind: "Call", name: token.name, span: token.span };
      }
    default:
      throw new Error(`Token '${token.kind}' is not a literal.`);
  }
}

function enclose(open: Span, close: Span): Span {
  return {
    file: open.file,
    startLine: open.startLine,
    startCol: open.startCol,
    endLine: close.endLine,
    endCol: close.endCol,
  };
}

export function parse(input: Lexer | Source | string, file: string = "<stdin>"): ParseResult {
  const lexer =
    input instanceof Lexer ? input : new Lexer(input instanceof Source ? input : new Source(file, input));

  const top: Expr[] = [];
  const frames: Frame[] = [];
  const current = (): Expr[] => (frames.length > 0 ? frames[frames.length - 1].exprs : top);

  for (const token of lexer) {
    switch (token.kind) {
      case "BlockOpen":
      case "ListOpen":
        frames.push({ kind: token.kind === "BlockOpen" ? "block" : "list", open: token.span, exprs: [] });
        break;

      case "BlockClose":
      case "ListClose": {
        const expected: FrameKind = token.kind === "BlockClose" ? "block" : "list";
        const frame = frames.pop();
        if (!frame || frame.kind !== expected) {
          const message = frame
            ? `Mismatched brackets: expected '${CLOSER[frame.kind]}' but found '${CLOSER[expected]}'.`
            : `Mismatched brackets: unexpected '${CLOSER[expected]}'.`;
          return { exprs: [], diagnostics: [...lexer.diagnostics, makeDiag("E_MISMATCHED_BRACKET", message, token.span)] };
        }
        const span = enclose(frame.open, token.span);
        current().push(
          frame.kind === "block"
            ? { kind: "Block", body: frame.exprs, span }
            : { kind: "List", items: frame.exprs, span }
        );
        break;
      }

      default:
        current().push(literal(token));
    }
  }

  if (frames.length > 0) {
    const innermost = frames[frames.length - 1];
    return {
      exprs: [],
      diagnostics: [
        ...lexer.diagnostics,
        makeDiag(
          "E_UNBALANCED_BLOCK",
          `Unbalanced blocks: ${frames.length} unclosed ${frames.length === 1 ? "bracket" : "brackets"}.`,
          innermost.open
        ),
      ],
    };
  }

  if (lexer.diagnostics.length > 0) {
    return { exprs: [], diagnostics: [...lexer.diagnostics] };
  }

  return { exprs: top, diagnostics: [] };
}
