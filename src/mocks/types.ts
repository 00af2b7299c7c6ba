/**
 * A request issued by the system under test.
 */
export interface TransportRequest {
  /** HTTP method, e.g. "GET" */
  method: string;
  /** Request URL exactly as registered, including any query string */
  url: string;
  /** Additional fields, matched when listed in `criteriaFields` */
  [field: string]: unknown;
}

/**
 * A response returned by the mock transport.
 */
export interface MockResponse {
  /** Status code */
  code: number;
  /** Response payload */
  data?: unknown;
  /** Any other field registered with the response */
  [field: string]: unknown;
}

/**
 * Recorded request history organized by HTTP method.
 */
export interface MockHistory {
  /** GET requests */
  readonly get: TransportRequest[];
  /** HEAD requests */
  readonly head: TransportRequest[];
  /** POST requests */
  readonly post: TransportRequest[];
  /** PUT requests */
  readonly put: TransportRequest[];
  /** PATCH requests */
  readonly patch: TransportRequest[];
  /** DELETE requests */
  readonly delete: TransportRequest[];
  /** All requests in order */
  readonly all: TransportRequest[];
}
