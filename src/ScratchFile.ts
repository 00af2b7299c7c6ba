import { rmSync } from "node:fs";
import { join } from "node:path";
import { createLogger, type Logger } from "./Logger.ts";

/**
 * Parts of a store file name.
 */
export interface StoreFilenameOptions {
  /** Directory the file lives in */
  directory: string;
  /** Leading part of the file name */
  prefix: string;
  /** Identifier of the owning test, if any */
  testId?: string;
  /** Clock used for the timestamp segment, in milliseconds */
  now?: () => number;
  /** Random source in [0, 1) used for the collision suffix */
  random?: () => number;
}

/**
 * Builds `<directory>/<prefix>[_<testId>]_<unix seconds>_<100..1000>.json`.
 */
export function createStoreFilename(options: StoreFilenameOptions): string {
  const now = options.now ?? Date.now;
  const random = options.random ?? Math.random;

  const segments = [options.prefix];
  if (options.testId) {
    segments.push(options.testId.replace(/[^A-Za-z0-9_-]+/g, "-"));
  }
  segments.push(
    String(Math.floor(now() / 1000)),
    String(100 + Math.floor(random() * 901)),
  );

  return join(options.directory, `${segments.join("_")}.json`);
}

/**
 * A file owned by one test run. It is deleted by an explicit call to
 * {@link ScratchFile.release} and never as a side effect of anything else.
 */
export class ScratchFile {
  readonly #path: string;
  readonly #logger: Logger;
  #released = false;

  private constructor(path: string, logger: Logger) {
    this.#path = path;
    this.#logger = logger;
  }

  /**
   * Reserves a uniquely named file path for the caller.
   */
  static acquire(
    options: StoreFilenameOptions & { logger?: Logger },
  ): ScratchFile {
    const logger = options.logger ?? createLogger("ScratchFile");
    const scratch = new ScratchFile(createStoreFilename(options), logger);
    logger.debug("Acquired scratch file", { path: scratch.path });
    return scratch;
  }

  get path(): string {
    return this.#path;
  }

  get released(): boolean {
    return this.#released;
  }

  /**
   * Deletes the file. Only the first call has an effect.
   * @returns false when the file could not be removed
   */
  release(): boolean {
    if (this.#released) return true;
    this.#released = true;

    try {
      rmSync(this.#path, { force: true });
      this.#logger.debug("Released scratch file", { path: this.#path });
      return true;
    } catch (error) {
      this.#logger.warn("Could not delete scratch file", {
        path: this.#path,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
