import type { MockHistory, TransportRequest } from "./types.ts";

/**
 * Implementation of MockHistory that tracks requests seen by the transport.
 */
export class MockHistoryImpl implements MockHistory {
  #byMethod = new Map<string, TransportRequest[]>();
  #all: TransportRequest[] = [];

  get get(): TransportRequest[] {
    return this.#requests("GET");
  }

  get head(): TransportRequest[] {
    return this.#requests("HEAD");
  }

  get post(): TransportRequest[] {
    return this.#requests("POST");
  }

  get put(): TransportRequest[] {
    return this.#requests("PUT");
  }

  get patch(): TransportRequest[] {
    return this.#requests("PATCH");
  }

  get delete(): TransportRequest[] {
    return this.#requests("DELETE");
  }

  get all(): TransportRequest[] {
    return [...this.#all];
  }

  /**
   * Records a request in the history.
   */
  record(request: TransportRequest): void {
    this.#all.push(request);

    const method = request.method.toUpperCase();
    const requests = this.#byMethod.get(method);
    if (requests) {
      requests.push(request);
    } else {
      this.#byMethod.set(method, [request]);
    }
  }

  /**
   * Clears all recorded history.
   */
  clear(): void {
    this.#byMethod.clear();
    this.#all = [];
  }

  #requests(method: string): TransportRequest[] {
    return [...(this.#byMethod.get(method) ?? [])];
  }
}
