/**
 * Mock transport utilities for integration tests.
 *
 * @example
 * ```typescript
 * import { MockSession, MockTransport } from "mock-transport-store/mocks";
 *
 * // In the test runner
 * const mocks = new MockSession();
 * mocks.setUp("user profile");
 * mocks.onGet("users/1").reply(200, { id: 1 });
 *
 * // In the system under test, which inherits the published store location
 * const transport = new MockTransport();
 * transport.request({ method: "GET", url: "users/1" });
 * // { code: 200, data: { id: 1 } }
 *
 * mocks.tearDown();
 * ```
 *
 * @module
 */

export {
  type FetchTarget,
  MockTransport,
  type MockTransportOptions,
} from "./MockTransport.ts";
export {
  MockSession,
  type MockSessionOptions,
  type RequestInput,
  type ResponseInput,
} from "./MockSession.ts";
export {
  MockResponseBuilder,
  type ResponseRegistrar,
} from "./MockResponseBuilder.ts";
export type { MockHistory, MockResponse, TransportRequest } from "./types.ts";
