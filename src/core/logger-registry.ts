import type { Logger } from "./logger.js";

/**
 * Name-keyed collection of shared loggers.
 *
 * Holds references only: removing or replacing an entry never closes the
 * logger, so other holders keep a working instance.
 */
export class LoggerRegistry {
  private readonly loggers = new Map<string, Logger>();

  /** Insert or replace. The logger takes `name` as its own name. */
  addLogger(name: string, logger: Logger): void {
    logger.setName(name);
    this.loggers.set(name, logger);
  }

  /** Returns whether an entry existed. */
  removeLogger(name: string): boolean {
    return this.loggers.delete(name);
  }

  getLogger(name: string): Logger | undefined {
    return this.loggers.get(name);
  }

  hasLogger(name: string): boolean {
    return this.loggers.has(name);
  }

  loggerNames(): string[] {
    return [...this.loggers.keys()];
  }

  get size(): number {
    return this.loggers.size;
  }

  clear(): void {
    this.loggers.clear();
  }
}

// ── Process-wide registry ──

let processRegistry: LoggerRegistry | null = null;

/** The process-wide registry, created on first use. */
export function getRegistry(): LoggerRegistry {
  processRegistry ??= new LoggerRegistry();
  return processRegistry;
}

/** Drop the process-wide registry; the next getRegistry() starts empty. */
export function resetRegistry(): void {
  processRegistry?.clear();
  processRegistry = null;
}

export function addLogger(name: string, logger: Logger): void {
  getRegistry().addLogger(name, logger);
}

export function removeLogger(name: string): boolean {
  return getRegistry().removeLogger(name);
}

export function getLogger(name: string): Logger | undefined {
  return getRegistry().getLogger(name);
}
