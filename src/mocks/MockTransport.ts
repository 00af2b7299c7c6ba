import { z } from "zod";
import { loadConfiguration } from "../Configuration.ts";
import { createLogger, type Logger } from "../Logger.ts";
import { MockStoreError } from "../MockStoreError.ts";
import { type Criteria, ObjectStore } from "../ObjectStore.ts";
import { EnvStoreLocator, type StoreLocator } from "../StoreLocator.ts";
import { MockHistoryImpl } from "./MockHistory.ts";
import type { MockHistory, MockResponse, TransportRequest } from "./types.ts";

type Fetch = typeof globalThis.fetch;

/**
 * Anything exposing a replaceable `fetch`, such as an HTTP client or a
 * provider of clients.
 */
export interface FetchTarget {
  fetch: Fetch | undefined;
}

/**
 * Options for {@link MockTransport}. The store is chosen by precedence:
 * `store`, then `filename`, then `locator`.
 */
export interface MockTransportOptions {
  /** Store to read responses from */
  store?: ObjectStore;
  /** Backing file of the store to read responses from */
  filename?: string;
  /** Source of the store path, an {@link EnvStoreLocator} by default */
  locator?: StoreLocator;
  /** Request fields used as search criteria, `["url", "method"]` by default */
  criteriaFields?: string[];
  logger?: Logger;
}

export const mockResponseSchema = z
  .object({ code: z.number().int(), data: z.unknown() })
  .passthrough();

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * Stand-in for a real transport. Answers each request with the first response
 * registered for it in the store, or with a 404 response describing the
 * request when nothing was registered.
 *
 * @example In the system under test
 * ```typescript
 * const transport = new MockTransport();
 * const response = transport.request({ method: "GET", url: "users/1" });
 * ```
 *
 * @example As a fetch replacement
 * ```typescript
 * const transport = new MockTransport({ filename: storePath });
 * transport.install(httpClient);
 * // ...
 * transport.restore();
 * ```
 */
export class MockTransport {
  readonly #store: ObjectStore | undefined;
  readonly #filename: string | undefined;
  readonly #locator: StoreLocator | undefined;
  readonly #criteriaFields: string[];
  readonly #logger: Logger;
  #history = new MockHistoryImpl();
  #resolved: ObjectStore | null = null;
  #target: FetchTarget | null = null;
  #originalFetch: Fetch | undefined = undefined;

  constructor(options: MockTransportOptions = {}) {
    this.#store = options.store;
    this.#filename = options.filename;
    this.#criteriaFields = options.criteriaFields ?? ["url", "method"];
    this.#logger = options.logger ?? createLogger("MockTransport");

    if (!this.#store && !this.#filename) {
      this.#locator = options.locator ??
        new EnvStoreLocator(loadConfiguration().storeVariable);
    }
  }

  /**
   * Resolves a request to its registered response.
   * @param request - Request with at least `url` and `method`
   * @returns The registered response without its criteria, or a 404 response
   */
  request(request: TransportRequest): MockResponse {
    this.#history.record(request);

    const criteria = this.#criteriaFor(request);
    const record = this.#resolveStore()?.search(criteria) ?? null;

    if (!record) {
      this.#logger.warn("No mock response registered", criteria);
      return {
        code: 404,
        data: `No mock response was found for URL ${request.url} ` +
          `and method ${request.method}. ` +
          "Check that setResponse() was given the same URL, " +
          "including query parameters.",
      };
    }

    const { criteria: _criteria, ...payload } = record;
    const parsed = mockResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.#logger.error("Registered mock response has no numeric code", {
        ...criteria,
        payload,
      });
      return {
        code: 500,
        data: `The mock response registered for URL ${request.url} ` +
          `and method ${request.method} has no numeric code.`,
      };
    }

    this.#logger.debug("Matched mock response", {
      ...criteria,
      code: parsed.data.code,
    });
    return parsed.data;
  }

  /**
   * Gets the recorded request history.
   */
  get history(): MockHistory {
    return this.#history;
  }

  /**
   * Clears the recorded request history.
   */
  resetHistory(): void {
    this.#history.clear();
  }

  /**
   * Gets a fetch function answering from the registered responses.
   * A string `data` becomes the body as-is, any other value is sent as JSON.
   */
  get fetch(): Fetch {
    const mockFetch: Fetch = (input, init) => this.#handleFetch(input, init);
    return mockFetch;
  }

  /**
   * Replaces the target's fetch implementation with
   * {@link MockTransport.fetch}.
   * @throws MockStoreError if already installed on a target
   */
  install(target: FetchTarget): void {
    if (this.#target) {
      throw new MockStoreError(
        "ALREADY_INSTALLED",
        "MockTransport is already installed. Call restore() first.",
      );
    }

    this.#target = target;
    this.#originalFetch = target.fetch;
    target.fetch = this.fetch;
  }

  /**
   * Restores the original fetch implementation.
   */
  restore(): void {
    if (!this.#target) return;

    this.#target.fetch = this.#originalFetch;
    this.#target = null;
    this.#originalFetch = undefined;
  }

  async #handleFetch(
    input: Parameters<Fetch>[0],
    init?: Parameters<Fetch>[1],
  ): Promise<Response> {
    const signal = init?.signal;
    if (signal?.aborted) {
      throw signal.reason;
    }

    const request = new Request(input, init);
    const response = this.request({
      method: request.method,
      url: request.url,
    });

    const headers = new Headers();
    let body: string | null = null;
    if (!NULL_BODY_STATUSES.has(response.code)) {
      if (typeof response.data === "string") {
        body = response.data;
      } else if (response.data !== undefined) {
        body = JSON.stringify(response.data);
        headers.set("Content-Type", "application/json");
      }
    }

    return new Response(body, { status: response.code, headers });
  }

  #criteriaFor(request: TransportRequest): Criteria {
    const criteria: Criteria = {};
    for (const field of this.#criteriaFields) {
      if (Object.hasOwn(request, field)) {
        criteria[field] = request[field];
      }
    }
    return criteria;
  }

  #resolveStore(): ObjectStore | null {
    if (this.#store) return this.#store;

    const filename = this.#filename ?? this.#locator?.resolve();
    if (!filename) {
      this.#logger.warn("No mock store is configured for this process");
      return null;
    }

    if (this.#resolved?.filename !== filename) {
      this.#resolved = new ObjectStore(filename, { logger: this.#logger });
    }
    return this.#resolved;
  }
}
