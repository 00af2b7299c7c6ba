import type { Criteria } from "../ObjectStore.ts";
import type { MockResponse } from "./types.ts";

/**
 * Anything that accepts response registrations.
 */
export interface ResponseRegistrar {
  setResponse(request: Criteria, response: MockResponse): void;
}

/**
 * Fluent builder for registering a mock response.
 * @template T The type of the registrar (for chaining)
 */
export class MockResponseBuilder<T extends ResponseRegistrar> {
  #criteria: Criteria;
  #registrar: T;

  constructor(criteria: Criteria, registrar: T) {
    this.#criteria = { ...criteria };
    this.#registrar = registrar;
  }

  /**
   * Adds criteria fields the request must match.
   * @param fields - Literal values, or RegExp / `/pattern/flags` strings
   * @returns This builder for further configuration
   */
  withCriteria(fields: Criteria): this {
    this.#criteria = { ...this.#criteria, ...fields };
    return this;
  }

  /**
   * Registers the response.
   * @param code - Status code
   * @param data - Response payload
   * @param extra - Additional response fields, such as headers
   * @returns The registrar for chaining
   */
  reply(code: number, data?: unknown, extra?: Record<string, unknown>): T {
    const response: MockResponse = { ...extra, code };
    if (data !== undefined) {
      response.data = data;
    }

    this.#registrar.setResponse(this.#criteria, response);
    return this.#registrar;
  }
}
