/**
 * One evaluation unit: a context, a module engine and a machine whose stack
 * persists across evaluations until reset.
 */
import {
  Context,
  Engine,
  VM,
  VMError,
  parse,
  show,
  type Diagnostic,
  type Expr,
  type Source,
  type StackConfig,
  type StackOutput,
  type TraceEvent,
} from "@stackvm/core";
import { stdLoader } from "@stackvm/std";

export interface SessionOptions {
  config: StackConfig;
  output?: StackOutput;
  trace?: (event: TraceEvent) => void;
  runId?: string;
  /** Base directory for the fs module. */
  cwd?: string;
}

export type Outcome =
  | { kind: "ok"; stack: Expr[] }
  | { kind: "diagnostics"; diagnostics: Diagnostic[] }
  | { kind: "failure"; error: VMError; stack: Expr[] };

export function formatStack(stack: readonly Expr[]): string {
  return ["stack:", ...stack.map((e) => show(e, true))].join(" ");
}

export class Session {
  private state: { context: Context; vm: VM };

  constructor(private readonly options: SessionOptions) {
    this.state = this.build();
  }

  get context(): Context {
    return this.state.context;
  }

  get vm(): VM {
    return this.state.vm;
  }

  /** Discards every binding, the journal and the stack. */
  reset(): void {
    this.state = this.build();
  }

  private build(): { context: Context; vm: VM } {
    const { config } = this.options;
    const context = new Context().withJournal(config.journal ? config.journalLength : null);
    const engine = new Engine(stdLoader(config.modules, { sandbox: config.sandbox, root: this.options.cwd }));
    const vm = new VM({
      context,
      engine,
      output: this.options.output,
      trace: this.options.trace,
      runId: this.options.runId,
    });
    return { context, vm };
  }

  evaluate(source: Source): Outcome {
    this.context.addSource(source);
    const result = parse(source);
    if (result.diagnostics.length > 0) {
      return { kind: "diagnostics", diagnostics: result.diagnostics };
    }
    this.vm.compile(result.exprs);
    try {
      return { kind: "ok", stack: this.vm.run() };
    } catch (e) {
      if (e instanceof VMError) {
        return { kind: "failure", error: e, stack: [...this.vm.stack] };
      }
      throw e;
    }
  }
}
