import { loadConfiguration } from "../Configuration.ts";
import { isRegexPattern } from "../CriteriaMatcher.ts";
import { createLogger, type Logger } from "../Logger.ts";
import { MockStoreError } from "../MockStoreError.ts";
import { type Criteria, ObjectStore } from "../ObjectStore.ts";
import { ScratchFile } from "../ScratchFile.ts";
import { EnvStoreLocator, type StoreLocator } from "../StoreLocator.ts";
import {
  MockResponseBuilder,
  type ResponseRegistrar,
} from "./MockResponseBuilder.ts";
import { mockResponseSchema } from "./MockTransport.ts";
import type { MockResponse } from "./types.ts";

/**
 * Request criteria as accepted by {@link MockSession.setResponse}.
 */
export type RequestInput = Criteria | Map<string, unknown>;

/**
 * Response as accepted by {@link MockSession.setResponse}.
 */
export type ResponseInput = MockResponse | Map<string, unknown>;

/**
 * Options for {@link MockSession}.
 */
export interface MockSessionOptions {
  /** Directory of the store files, the configured scratch directory */
  directory?: string;
  /** File name prefix of the store files */
  prefix?: string;
  /** Where the store path is published, an {@link EnvStoreLocator} */
  locator?: StoreLocator;
  logger?: Logger;
}

/**
 * Test-side half of the mock transport: owns the store of one test, publishes
 * its location to the system under test and registers responses in it.
 *
 * @example
 * ```typescript
 * const mocks = new MockSession();
 *
 * beforeEach((ctx) => mocks.setUp(ctx.task.name));
 * afterEach(() => mocks.tearDown());
 *
 * test("shows the user", () => {
 *   mocks.setResponse(
 *     { method: "GET", url: "users/1" },
 *     { code: 200, data: '{"id":1}' },
 *   );
 *   mocks.onGet(/^users\/\d+$/).reply(200, { id: 2 });
 * });
 * ```
 */
export class MockSession implements ResponseRegistrar {
  readonly #directory: string;
  readonly #prefix: string;
  readonly #locator: StoreLocator;
  readonly #logger: Logger;
  #scratch: ScratchFile | null = null;
  #store: ObjectStore | null = null;

  constructor(options: MockSessionOptions = {}) {
    const configuration = options.directory === undefined ||
        options.prefix === undefined || options.locator === undefined
      ? loadConfiguration()
      : null;

    this.#directory = options.directory ?? configuration?.scratchDirectory ??
      ".";
    this.#prefix = options.prefix ?? configuration?.prefix ?? "store";
    this.#locator = options.locator ??
      new EnvStoreLocator(configuration?.storeVariable);
    this.#logger = options.logger ?? createLogger("MockSession");
  }

  /**
   * Gets the store file of the running test, if a test is set up.
   */
  get filename(): string | undefined {
    return this.#scratch?.path;
  }

  /**
   * Gets the store of the running test.
   * @throws MockStoreError if no test is set up
   */
  get store(): ObjectStore {
    if (!this.#store) {
      throw new MockStoreError(
        "SESSION_NOT_STARTED",
        "MockSession has no store. Call setUp() first.",
      );
    }
    return this.#store;
  }

  /**
   * Creates an empty store for a test and publishes its location.
   * A store left by a previous test that was not torn down is released first.
   * @param testId - Identifier of the test, part of the store file name
   */
  setUp(testId?: string): void {
    if (this.#scratch) {
      this.tearDown();
    }

    const scratch = ScratchFile.acquire({
      directory: this.#directory,
      prefix: this.#prefix,
      testId,
      logger: this.#logger,
    });

    this.#scratch = scratch;
    this.#store = new ObjectStore(scratch.path, { logger: this.#logger });
    this.#locator.publish(scratch.path);
    this.#logger.debug("Mock store ready", { filename: scratch.path });
  }

  /**
   * Deletes the store of the running test and withdraws its location.
   * Does nothing when no test is set up.
   */
  tearDown(): void {
    if (!this.#scratch) return;

    this.#scratch.release();
    this.#locator.clear();
    this.#scratch = null;
    this.#store = null;
  }

  /**
   * Registers the response returned for requests matching the criteria.
   * Responses registered first win over later ones matching the same request.
   * @param request - Criteria such as `{ method, url }`; RegExp values match
   *   as patterns
   * @param response - Response with at least a numeric `code`
   * @throws MockStoreError if no test is set up or the response has no
   *   numeric code
   */
  setResponse(request: RequestInput, response: ResponseInput): void {
    const store = this.store;

    const parsed = mockResponseSchema.safeParse(toRecord(response));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message);
      throw new MockStoreError(
        "INVALID_RESPONSE",
        `Mock response must have a numeric code: ${issues.join("; ")}`,
      );
    }

    const criteria: Criteria = {};
    for (const [field, value] of Object.entries(toRecord(request))) {
      criteria[field] = value instanceof RegExp ? value.toString() : value;
    }

    store.add({ ...parsed.data, criteria });
  }

  /**
   * Starts registering a response for requests matching the criteria.
   */
  on(criteria: Criteria): MockResponseBuilder<MockSession> {
    return new MockResponseBuilder(criteria, this);
  }

  /**
   * Starts registering a response for GET requests to the URL.
   * @param url - Exact URL, or a RegExp matched against it
   */
  onGet(url: string | RegExp): MockResponseBuilder<MockSession> {
    return this.on({ method: "GET", url: exactUrl(url) });
  }

  /**
   * Starts registering a response for HEAD requests to the URL.
   * @param url - Exact URL, or a RegExp matched against it
   */
  onHead(url: string | RegExp): MockResponseBuilder<MockSession> {
    return this.on({ method: "HEAD", url: exactUrl(url) });
  }

  /**
   * Starts registering a response for POST requests to the URL.
   * @param url - Exact URL, or a RegExp matched against it
   */
  onPost(url: string | RegExp): MockResponseBuilder<MockSession> {
    return this.on({ method: "POST", url: exactUrl(url) });
  }

  /**
   * Starts registering a response for PUT requests to the URL.
   * @param url - Exact URL, or a RegExp matched against it
   */
  onPut(url: string | RegExp): MockResponseBuilder<MockSession> {
    return this.on({ method: "PUT", url: exactUrl(url) });
  }

  /**
   * Starts registering a response for PATCH requests to the URL.
   * @param url - Exact URL, or a RegExp matched against it
   */
  onPatch(url: string | RegExp): MockResponseBuilder<MockSession> {
    return this.on({ method: "PATCH", url: exactUrl(url) });
  }

  /**
   * Starts registering a response for DELETE requests to the URL.
   * @param url - Exact URL, or a RegExp matched against it
   */
  onDelete(url: string | RegExp): MockResponseBuilder<MockSession> {
    return this.on({ method: "DELETE", url: exactUrl(url) });
  }

  /**
   * Removes every registered response of the running test.
   * @throws MockStoreError if no test is set up
   */
  reset(): void {
    this.store.reset();
  }
}

/**
 * Keeps a string URL literal: one that would read as `/pattern/flags` is
 * stored as an anchored pattern matching only itself.
 */
function exactUrl(url: string | RegExp): string | RegExp {
  if (!isRegexPattern(url)) return url;

  const escaped = url.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
  return `/^${escaped}$/`;
}

function toRecord(
  value: Record<string, unknown> | Map<string, unknown>,
): Record<string, unknown> {
  return value instanceof Map ? Object.fromEntries(value) : { ...value };
}
