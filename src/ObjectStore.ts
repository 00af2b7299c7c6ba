import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { loadConfiguration } from "./Configuration.ts";
import { criteriaMatches } from "./CriteriaMatcher.ts";
import { createLogger, type Logger } from "./Logger.ts";
import { createStoreFilename } from "./ScratchFile.ts";

/**
 * Field values a record is keyed on. A string value written as `/pattern/flags`
 * is matched as a regular expression.
 */
export type Criteria = Record<string, unknown>;

/**
 * A stored record: its criteria plus any payload fields.
 */
export interface StoredRecord {
  criteria: Criteria;
  [field: string]: unknown;
}

const storedRecordsSchema = z.array(
  z.object({ criteria: z.record(z.unknown()) }).passthrough(),
);

/**
 * Options for {@link ObjectStore}.
 */
export interface ObjectStoreOptions {
  /** Directory of an ad hoc store, when no filename is given */
  directory?: string;
  /** File name prefix of an ad hoc store, when no filename is given */
  prefix?: string;
  logger?: Logger;
}

/**
 * Ordered collection of records persisted as a JSON array in one file, so that
 * separate processes can share it. Every write rewrites the whole file.
 *
 * Storage failures never reach the caller: unreadable or malformed content
 * reads as an empty store and a failed write returns false.
 *
 * @example
 * ```typescript
 * const store = new ObjectStore("/tmp/responses.json");
 * store.add({ criteria: { method: "GET", url: "users/1" }, code: 200 });
 *
 * store.search({ method: "GET", url: "users/1" }); // the record above
 * store.search({ method: "POST", url: "users/1" }); // null
 * ```
 */
export class ObjectStore {
  #filename: string;
  readonly #logger: Logger;

  /**
   * @param filename - Backing file; an ad hoc name in the scratch directory when omitted
   */
  constructor(filename?: string, options: ObjectStoreOptions = {}) {
    this.#logger = options.logger ?? createLogger("ObjectStore");

    if (filename) {
      this.#filename = filename;
    } else {
      const needsConfiguration = options.directory === undefined ||
        options.prefix === undefined;
      const configuration = needsConfiguration ? loadConfiguration() : null;
      this.#filename = createStoreFilename({
        directory: options.directory ?? configuration?.scratchDirectory ?? ".",
        prefix: options.prefix ?? configuration?.prefix ?? "store",
      });
    }

    this.#initFile(false);
  }

  /**
   * Gets the backing file path.
   */
  get filename(): string {
    return this.#filename;
  }

  /**
   * Points the store at another backing file, creating it when missing.
   */
  setFilename(filename: string): void {
    this.#filename = filename;
    this.#initFile(false);
  }

  /**
   * Appends a record and rewrites the backing file.
   * @returns false when the file could not be written
   */
  add(record: StoredRecord): boolean {
    const records = this.getAll();
    records.push(record);

    return this.#write(JSON.stringify(records, null, 4));
  }

  /**
   * Removes every record. The backing file is kept, empty.
   */
  reset(): void {
    this.#initFile(true);
  }

  /**
   * Gets all records in insertion order, or an empty array when the backing
   * file is missing, unreadable or malformed.
   */
  getAll(): StoredRecord[] {
    let contents: string;
    try {
      contents = readFileSync(this.#filename, "utf8");
    } catch (error) {
      this.#logger.debug("Store file is not readable", {
        filename: this.#filename,
        error: describe(error),
      });
      return [];
    }

    if (contents.trim() === "") {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      this.#logger.warn("Store file does not contain valid JSON", {
        filename: this.#filename,
        error: describe(error),
      });
      return [];
    }

    const result = storedRecordsSchema.safeParse(parsed);
    if (!result.success) {
      this.#logger.warn("Store file does not contain a list of records", {
        filename: this.#filename,
        issues: result.error.issues.map((issue) => issue.message),
      });
      return [];
    }

    return result.data;
  }

  /**
   * Gets the number of stored records.
   */
  count(): number {
    return this.getAll().length;
  }

  /**
   * Finds the first stored record whose criteria has every searched field
   * with a matching value.
   * @returns The record, or null when none matches or no field is searched
   */
  search(criteria: Criteria): StoredRecord | null {
    const fields = Object.entries(criteria);
    if (fields.length === 0) {
      return null;
    }

    for (const record of this.getAll()) {
      const matches = fields.every(([field, value]) =>
        Object.hasOwn(record.criteria, field) &&
        criteriaMatches(record.criteria[field], value)
      );

      if (matches) {
        return record;
      }
    }

    return null;
  }

  #initFile(reset: boolean): void {
    if (reset || !existsSync(this.#filename)) {
      this.#write("");
    }
  }

  #write(contents: string): boolean {
    try {
      writeFileSync(this.#filename, contents, "utf8");
      return true;
    } catch (error) {
      this.#logger.warn("Could not write store file", {
        filename: this.#filename,
        error: describe(error),
      });
      return false;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
