import type { Expr, Span } from "./expr.js";
import type { Diagnostic, DiagnosticCode } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

/**
 * A machine failure. The machine stops at the failing step and leaves its
 * stack as it was before that step.
 */
export class VMError extends Error {
  code: DiagnosticCode;
  span?: Span;
  details?: Record<string, Expr>;

  constructor(code: DiagnosticCode, message: string, span?: Span, details?: Record<string, Expr>) {
    super(message);
    this.name = "VMError";
    this.code = code;
    this.span = span;
    this.details = details;
  }

  toDiagnostic(): Diagnostic {
    return makeDiag(this.code, this.message, this.span);
  }
}
