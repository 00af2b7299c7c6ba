/**
 * Codes identifying the programmer errors raised by the mock store.
 */
export type MockStoreErrorCode =
  | "INVALID_CONFIGURATION"
  | "SESSION_NOT_STARTED"
  | "INVALID_RESPONSE"
  | "ALREADY_INSTALLED";

/**
 * Error raised for misuse of the mock store API.
 * Storage failures and unmatched requests are never reported through it.
 */
export class MockStoreError extends Error {
  public readonly code: MockStoreErrorCode;

  constructor(code: MockStoreErrorCode, message: string) {
    super(message);
    this.name = "MockStoreError";
    this.code = code;
  }
}
