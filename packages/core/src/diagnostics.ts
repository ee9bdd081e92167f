/**
 * Diagnostics for lex, parse and machine failures.
 */
import type { Span } from "./expr.js";

export type DiagnosticCode =
  // lex / parse
  | "E_LEX"
  | "E_INT_RANGE"
  | "E_MISMATCHED_BRACKET"
  | "E_UNBALANCED_BLOCK"
  // machine
  | "E_STACK_UNDERFLOW"
  | "E_IP_BOUNDS"
  | "E_ARITH_TYPE"
  | "E_DIV_ZERO"
  | "E_TYPE"
  | "E_UNKNOWN_NAME"
  | "E_UNKNOWN_MODULE"
  | "E_UNBOUND"
  | "E_CAST"
  | "E_ASSERT"
  | "E_MODULE_FN"
  // cli
  | "E_IO";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  span?: Span;
  hint?: string;
}

const DEFAULT_HINTS: Partial<Record<DiagnosticCode, string>> = {
  E_LEX: "Check for invalid characters or unclosed strings.",
  E_INT_RANGE: "Integer literals must fit in a signed 64-bit integer; use a float instead.",
  E_MISMATCHED_BRACKET: "Each '(' must be closed by ')' and each '[' by ']'.",
  E_UNBALANCED_BLOCK: "A block or list is missing its closing bracket.",
  E_STACK_UNDERFLOW: "The operation needs more values than the stack holds.",
  E_UNKNOWN_NAME: "Bind the name with 'let' or 'def', or 'import' its module first.",
};

export function makeDiag(
  code: DiagnosticCode,
  message: string,
  span?: Span,
  hint: string | undefined = DEFAULT_HINTS[code]
): Diagnostic {
  return { code, message, span, hint };
}

export function formatSpan(span: Span | undefined): string {
  return span ? `${span.file}:${span.startLine}:${span.startCol}` : "<unknown>";
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `error[${d.code}]: ${d.message}\n  --> ${formatSpan(d.span)}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
