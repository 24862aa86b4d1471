/**
 * Fixture watcher.
 *
 * Watches a fixture directory with chokidar v4 and re-checks a fixture
 * whenever it is added or changed. Rapid saves are debounced per file, so an
 * editor writing a file in several chunks yields one check.
 */

import { watch, type FSWatcher } from "chokidar";
import { basename } from "node:path";
import { checkFile, isFixtureFile, type CheckOptions, type FixtureReport } from "../cli/check.js";

const LOG_PREFIX = "[tg-schema watch]";

export type FixtureReportHandler = (report: FixtureReport) => void;

export interface FixtureWatcherOptions extends CheckOptions {
  dir: string;
  onReport: FixtureReportHandler;
  debounceMs?: number;
}

export class FixtureWatcher {
  private watcher: FSWatcher | null = null;
  private debouncedHandlers: Map<string, ReturnType<typeof setTimeout>> = new Map();
  private readonly dir: string;
  private readonly onReport: FixtureReportHandler;
  private readonly checkOptions: CheckOptions;
  private readonly debounceMs: number;

  constructor(options: FixtureWatcherOptions) {
    this.dir = options.dir;
    this.onReport = options.onReport;
    this.checkOptions = { strict: options.strict, defaultType: options.defaultType };
    this.debounceMs = options.debounceMs ?? 150;
  }

  /** Start watching; resolves once chokidar finished its initial scan. */
  async start(): Promise<void> {
    if (this.watcher) return;

    const watcher = watch(this.dir, {
      // The watched directory itself must pass the filter.
      ignored: (path, stats) => stats?.isFile() === true && !isFixtureFile(path),
      // Only direct children are fixtures.
      depth: 0,
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 25,
      },
    });
    this.watcher = watcher;

    watcher.on("add", (path: string) => this.schedule(path));
    watcher.on("change", (path: string) => this.schedule(path));
    watcher.on("unlink", (path: string) => {
      console.log(`${LOG_PREFIX} removed ${basename(path)}`);
    });

    watcher.on("error", (err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`${LOG_PREFIX} error:`, message);
    });

    await new Promise<void>((resolve) => {
      watcher.on("ready", () => resolve());
    });
    console.log(`${LOG_PREFIX} watching ${this.dir}`);
  }

  async stop(): Promise<void> {
    for (const timer of this.debouncedHandlers.values()) {
      clearTimeout(timer);
    }
    this.debouncedHandlers.clear();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }

  private schedule(path: string): void {
    if (!isFixtureFile(path)) return;

    const existing = this.debouncedHandlers.get(path);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.debouncedHandlers.delete(path);
      void this.recheck(path);
    }, this.debounceMs);

    this.debouncedHandlers.set(path, timer);
  }

  private async recheck(path: string): Promise<void> {
    try {
      const report = await checkFile(path, this.checkOptions);
      this.onReport(report);
    } catch (err) {
      // Unreadable files come back as failed reports; this is the handler throwing.
      const message = err instanceof Error ? err.message : String(err);
      console.error(`${LOG_PREFIX} could not check ${basename(path)}:`, message);
    }
  }
}
