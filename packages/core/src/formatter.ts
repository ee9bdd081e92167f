/**
 * Canonical re-printer for parsed source.
 * Produces deterministic, idempotent output: one space between expressions,
 * two-space indentation inside composites that span several lines, at most
 * one blank line in a row, and every comment kept on its original line.
 */
import type { Expr } from "./expr.js";
import { show } from "./expr.js";
import type { SourceComment } from "./lexer.js";

const INDENT = "  ";

interface Line {
  depth: number;
  parts: string[];
  /** Next part attaches to the previous one without a space. */
  glue: boolean;
  /** Source line of the last thing placed here. */
  sourceLine: number;
}

class Layout {
  readonly lines: Line[] = [];
  private readonly comments: SourceComment[];

  constructor(comments: SourceComment[]) {
    this.comments = [...comments].sort((a, b) => a.line - b.line);
  }

  private get last(): Line | undefined {
    return this.lines[this.lines.length - 1];
  }

  private newLine(depth: number, sourceLine: number): Line {
    const prev = this.last;
    if (prev && sourceLine > prev.sourceLine + 1) {
      this.lines.push({ depth: 0, parts: [], glue: false, sourceLine: sourceLine - 1 });
    }
    const line: Line = { depth, parts: [], glue: false, sourceLine };
    this.lines.push(line);
    return line;
  }

  /** Emits every comment that sits before `sourceLine`. */
  flushComments(sourceLine: number, depth: number): void {
    let comment = this.comments[0];
    while (comment && comment.line < sourceLine) {
      this.comments.shift();
      const last = this.last;
      if (last && last.sourceLine === comment.line && last.parts.length > 0) {
        last.parts.push(comment.text);
      } else {
        this.newLine(depth, comment.line).parts.push(comment.text);
      }
      comment = this.comments[0];
    }
  }

  place(text: string, startLine: number, endLine: number, depth: number, attach = false): void {
    let line = this.last;
    if (!line || startLine > line.sourceLine) {
      this.flushComments(startLine, depth);
      line = this.newLine(depth, startLine);
    }
    const prevPart = line.parts.length - 1;
    if ((line.glue || attach) && prevPart >= 0) {
      line.parts[prevPart] += text;
    } else {
      line.parts.push(text);
    }
    line.glue = false;
    line.sourceLine = endLine;
  }

  openGlue(): void {
    const line = this.last;
    if (line) line.glue = true;
  }
}

function childrenOf(expr: Expr): { open: string; close: string; items: Expr[] } | null {
  if (expr.kind === "Block") return { open: "(", close: ")", items: expr.body };
  if (expr.kind === "List") return { open: "[", close: "]", items: expr.items };
  return null;
}

function layoutExprs(exprs: Expr[], depth: number, layout: Layout, fallbackLine: number): void {
  let line = fallbackLine;
  for (const expr of exprs) {
    const startLine = expr.span?.startLine ?? line;
    const endLine = expr.span?.endLine ?? startLine;
    const composite = childrenOf(expr);
    if (composite && endLine > startLine) {
      layout.place(composite.open, startLine, startLine, depth);
      layout.openGlue();
      layoutExprs(composite.items, depth + 1, layout, startLine);
      layout.flushComments(endLine, depth + 1);
      layout.place(composite.close, endLine, endLine, depth, true);
    } else {
      layout.place(show(expr, true), startLine, endLine, depth);
    }
    line = endLine;
  }
}

export function format(exprs: Expr[], comments: SourceComment[] = []): string {
  const layout = new Layout(comments);
  layoutExprs(exprs, 0, layout, 1);
  layout.flushComments(Number.POSITIVE_INFINITY, 0);
  const text = layout.lines
    .map((line) => (line.parts.length === 0 ? "" : INDENT.repeat(line.depth) + line.parts.join(" ")))
    .join("\n");
  return text.length > 0 ? `${text}\n` : "";
}
