import { readFileSync, rmSync, writeFileSync } from "node:fs";
import { createLogger, type Logger } from "./Logger.ts";

/**
 * Carries the path of the active store from the test runner to the system
 * under test. `resolve()` reads its source again on every call, so a process
 * always sees the most recently published path.
 */
export interface StoreLocator {
  /** Announces the store file of the current test run */
  publish(filename: string): void;
  /** Gets the announced store file, if any */
  resolve(): string | undefined;
  /** Withdraws the announcement */
  clear(): void;
}

export const DEFAULT_STORE_VARIABLE = "MOCK_TRANSPORT_STORE_FILE";

/**
 * Publishes the store path in an environment variable. Processes spawned
 * after {@link EnvStoreLocator.publish} inherit it.
 */
export class EnvStoreLocator implements StoreLocator {
  readonly #variable: string;
  readonly #env: NodeJS.ProcessEnv;

  constructor(
    variable: string = DEFAULT_STORE_VARIABLE,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    this.#variable = variable;
    this.#env = env;
  }

  get variable(): string {
    return this.#variable;
  }

  publish(filename: string): void {
    this.#env[this.#variable] = filename;
  }

  resolve(): string | undefined {
    const value = this.#env[this.#variable];
    return value ? value : undefined;
  }

  clear(): void {
    delete this.#env[this.#variable];
  }
}

/**
 * Publishes the store path in a pointer file, for processes that are already
 * running when the test starts.
 */
export class FileStoreLocator implements StoreLocator {
  readonly #pointerPath: string;
  readonly #logger: Logger;

  constructor(pointerPath: string, logger?: Logger) {
    this.#pointerPath = pointerPath;
    this.#logger = logger ?? createLogger("FileStoreLocator");
  }

  get pointerPath(): string {
    return this.#pointerPath;
  }

  publish(filename: string): void {
    writeFileSync(this.#pointerPath, filename, "utf8");
  }

  resolve(): string | undefined {
    let contents: string;
    try {
      contents = readFileSync(this.#pointerPath, "utf8");
    } catch (error) {
      this.#logger.debug("Store pointer file is not readable", {
        pointerPath: this.#pointerPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const filename = contents.trim();
    return filename ? filename : undefined;
  }

  clear(): void {
    rmSync(this.#pointerPath, { force: true });
  }
}
