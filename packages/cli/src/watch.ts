/**
 * stack run --watch - re-run a file from scratch whenever it changes
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { Source } from "@stackvm/core";
import { evaluateIn, emitIoError, runSession, type RunOptions } from "./cmd-run.js";

const DEBOUNCE_MS = 50;

export class Watcher {
  private readonly watchers = new Map<string, fs.FSWatcher>();
  private loaded: string[] = [];
  private timer: NodeJS.Timeout | null = null;
  private runs = 0;

  constructor(
    private readonly file: string,
    private readonly opts: RunOptions,
    private readonly clearScreen: () => void = () => console.clear()
  ) {}

  get runCount(): number {
    return this.runs;
  }

  get isWatching(): boolean {
    return this.watchers.size > 0;
  }

  /** Files the last run loaded, as absolute paths. */
  get sourcePaths(): readonly string[] {
    return this.loaded;
  }

  get watchedPaths(): string[] {
    return [...this.watchers.keys()];
  }

  /** One evaluation with a fresh context and machine. */
  runOnce(): number {
    this.runs++;
    let source: Source;
    try {
      source = Source.fromPath(this.file);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      return emitIoError(`Error reading file: ${msg}`, !!this.opts.pretty);
    }
    const session = runSession(this.opts);
    try {
      return evaluateIn(session, source, !!this.opts.pretty);
    } finally {
      this.loaded = [];
      for (const [name] of session.context.sources()) {
        const filePath = path.resolve(name);
        if (fs.existsSync(filePath)) this.loaded.push(filePath);
      }
    }
  }

  start(): number {
    const code = this.runOnce();
    try {
      this.watch(path.resolve(this.file));
      this.watchLoaded();
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      this.close();
      return emitIoError(`Error watching file: ${msg}`, !!this.opts.pretty);
    }
    return code;
  }

  close(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    for (const watcher of this.watchers.values()) watcher.close();
    this.watchers.clear();
  }

  private watchLoaded(): void {
    for (const filePath of this.loaded) this.watch(filePath);
  }

  private watch(filePath: string): void {
    if (this.watchers.has(filePath)) return;
    const watcher = fs.watch(filePath, () => this.schedule());
    watcher.on("error", (e) => {
      console.error(`error: watching ${filePath} failed: ${e.message}`);
      this.close();
    });
    this.watchers.set(filePath, watcher);
  }

  /** Editors emit several events per save; coalesce them into one run. */
  private schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.clearScreen();
      this.runOnce();
      try {
        this.watchLoaded();
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        console.error(`error: watching failed: ${msg}`);
      }
    }, DEBOUNCE_MS);
  }
}

export async function runWatch(file: string, opts: RunOptions): Promise<number> {
  const watcher = new Watcher(file, opts);
  const code = watcher.start();
  if (!watcher.isWatching) return code;
  console.error(`Watching ${file} (Ctrl+C to stop)`);
  return new Promise((resolve) => {
    process.once("SIGINT", () => {
      watcher.close();
      resolve(0);
    });
  });
}
