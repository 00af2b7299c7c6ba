import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, expect, test } from "vitest";
import { MockStoreError } from "../MockStoreError.ts";
import { ObjectStore } from "../ObjectStore.ts";
import { EnvStoreLocator } from "../StoreLocator.ts";
import { type FetchTarget, MockTransport } from "../mocks/MockTransport.ts";

const directories: string[] = [];

function createDirectory(): string {
  const directory = mkdtempSync(join(tmpdir(), "mock-transport-"));
  directories.push(directory);
  return directory;
}

function createStore(): ObjectStore {
  return new ObjectStore(join(createDirectory(), "store.json"));
}

afterEach(() => {
  for (const directory of directories.splice(0)) {
    rmSync(directory, { recursive: true, force: true });
  }
});

test("MockTransport - returns the registered response without criteria", () => {
  const store = createStore();
  store.add({
    criteria: { method: "GET", url: "users/1" },
    code: 200,
    data: '{"id":1}',
  });

  const transport = new MockTransport({ store });
  const response = transport.request({ method: "GET", url: "users/1" });

  expect(response).toEqual({ code: 200, data: '{"id":1}' });
  expect("criteria" in response).toBe(false);
});

test("MockTransport - keeps extra response fields", () => {
  const store = createStore();
  store.add({
    criteria: { method: "GET", url: "users/1" },
    code: 200,
    data: null,
    headers: { "X-Total": "1" },
  });

  const transport = new MockTransport({ store });

  expect(transport.request({ method: "GET", url: "users/1" })).toEqual({
    code: 200,
    data: null,
    headers: { "X-Total": "1" },
  });
});

test("MockTransport - answers 404 naming the URL and method", () => {
  const transport = new MockTransport({ store: createStore() });

  const response = transport.request({ method: "POST", url: "users/9" });

  expect(response.code).toBe(404);
  expect(response.data).toBe(
    "No mock response was found for URL users/9 and method POST. " +
      "Check that setResponse() was given the same URL, including query parameters.",
  );
});

test("MockTransport - returns the first matching registration", () => {
  const store = createStore();
  store.add({ criteria: { method: "GET", url: "a" }, code: 200, data: "R1" });
  store.add({ criteria: { method: "GET", url: "a" }, code: 200, data: "R2" });

  const transport = new MockTransport({ store });

  expect(transport.request({ method: "GET", url: "a" }).data).toBe("R1");
});

test("MockTransport - matches on url and method only by default", () => {
  const store = createStore();
  store.add({
    criteria: { method: "POST", url: "orders", body: "x" },
    code: 201,
  });

  const transport = new MockTransport({ store });

  expect(transport.request({ method: "POST", url: "orders", body: "y" }).code)
    .toBe(201);
});

test("MockTransport - criteriaFields adds request fields to the search", () => {
  const store = createStore();
  store.add({
    criteria: { method: "POST", url: "orders", body: "x" },
    code: 201,
  });

  const transport = new MockTransport({
    store,
    criteriaFields: ["url", "method", "body"],
  });

  expect(transport.request({ method: "POST", url: "orders", body: "y" }).code)
    .toBe(404);
  expect(transport.request({ method: "POST", url: "orders", body: "x" }).code)
    .toBe(201);
});

test("MockTransport - matches regex criteria", () => {
  const store = createStore();
  store.add({
    criteria: { method: "GET", url: "/^users\\/\\d+$/" },
    code: 200,
    data: "user",
  });

  const transport = new MockTransport({ store });

  expect(transport.request({ method: "GET", url: "users/42" }).data).toBe("user");
  expect(transport.request({ method: "GET", url: "users/me" }).code).toBe(404);
});

test("MockTransport - reads registrations made after it was created", () => {
  const store = createStore();
  const transport = new MockTransport({ filename: store.filename });

  expect(transport.request({ method: "GET", url: "a" }).code).toBe(404);

  store.add({ criteria: { method: "GET", url: "a" }, code: 200 });

  expect(transport.request({ method: "GET", url: "a" }).code).toBe(200);
});

test("MockTransport - follows the store published through the locator", () => {
  const first = createStore();
  first.add({ criteria: { method: "GET", url: "a" }, code: 200, data: "first" });
  const second = createStore();
  second.add({ criteria: { method: "GET", url: "a" }, code: 200, data: "second" });

  const env: NodeJS.ProcessEnv = {};
  const locator = new EnvStoreLocator("TEST_STORE_FILE", env);
  const transport = new MockTransport({ locator });

  locator.publish(first.filename);
  expect(transport.request({ method: "GET", url: "a" }).data).toBe("first");

  locator.publish(second.filename);
  expect(transport.request({ method: "GET", url: "a" }).data).toBe("second");
});

test("MockTransport - answers 404 when no store is published", () => {
  const locator = new EnvStoreLocator("TEST_STORE_FILE", {});
  const transport = new MockTransport({ locator });

  expect(transport.request({ method: "GET", url: "a" }).code).toBe(404);
});

test("MockTransport - answers 500 for a registration without a numeric code", () => {
  const store = createStore();
  store.add({ criteria: { method: "GET", url: "a" }, code: "200" });

  const transport = new MockTransport({ store });

  expect(transport.request({ method: "GET", url: "a" })).toEqual({
    code: 500,
    data: "The mock response registered for URL a and method GET has no numeric code.",
  });
});

test("MockTransport - records request history by method", () => {
  const transport = new MockTransport({ store: createStore() });

  transport.request({ method: "GET", url: "a" });
  transport.request({ method: "POST", url: "b" });
  transport.request({ method: "get", url: "c" });

  expect(transport.history.all.map((request) => request.url)).toEqual([
    "a",
    "b",
    "c",
  ]);
  expect(transport.history.get.map((request) => request.url)).toEqual([
    "a",
    "c",
  ]);
  expect(transport.history.post.length).toBe(1);
  expect(transport.history.delete).toEqual([]);

  transport.resetHistory();
  expect(transport.history.all).toEqual([]);
});

test("MockTransport - fetch answers with JSON data", async () => {
  const store = createStore();
  store.add({
    criteria: { method: "GET", url: "https://example.com/api/users" },
    code: 200,
    data: [{ id: 1, name: "Alice" }],
  });

  const transport = new MockTransport({ store });
  const response = await transport.fetch("https://example.com/api/users");

  expect(response.status).toBe(200);
  expect(response.headers.get("Content-Type")).toBe("application/json");
  expect(await response.json()).toEqual([{ id: 1, name: "Alice" }]);
});

test("MockTransport - fetch sends string data as is", async () => {
  const store = createStore();
  store.add({
    criteria: { method: "POST", url: "/\\/api\\/users\\/\\d+$/" },
    code: 201,
    data: '{"id":7}',
  });

  const transport = new MockTransport({ store });
  const response = await transport.fetch("https://example.com/api/users/7", {
    method: "POST",
    body: "{}",
  });

  expect(response.status).toBe(201);
  expect(response.headers.get("Content-Type")).toBeNull();
  expect(await response.text()).toBe('{"id":7}');
});

test("MockTransport - fetch answers 404 for unregistered requests", async () => {
  const transport = new MockTransport({ store: createStore() });

  const response = await transport.fetch("https://example.com/missing");

  expect(response.status).toBe(404);
  expect(await response.text()).toBe(
    "No mock response was found for URL https://example.com/missing and method GET. " +
      "Check that setResponse() was given the same URL, including query parameters.",
  );
});

test("MockTransport - fetch drops data for statuses without a body", async () => {
  const store = createStore();
  store.add({
    criteria: { method: "DELETE", url: "https://example.com/api/users/1" },
    code: 204,
    data: "ignored",
  });

  const transport = new MockTransport({ store });
  const response = await transport.fetch("https://example.com/api/users/1", {
    method: "DELETE",
  });

  expect(response.status).toBe(204);
  expect(await response.text()).toBe("");
});

test("MockTransport - fetch rejects an aborted request", async () => {
  const transport = new MockTransport({ store: createStore() });
  const controller = new AbortController();
  controller.abort();

  await expect(
    transport.fetch("https://example.com/api/users", {
      signal: controller.signal,
    }),
  ).rejects.toMatchObject({ name: "AbortError" });
  expect(transport.history.all).toEqual([]);
});

test("MockTransport - install replaces and restore puts back fetch", async () => {
  const store = createStore();
  store.add({
    criteria: { method: "GET", url: "https://example.com/ping" },
    code: 200,
    data: "pong",
  });
  const transport = new MockTransport({ store });
  const target: FetchTarget = { fetch: undefined };

  transport.install(target);
  const response = await target.fetch?.("https://example.com/ping");
  expect(await response?.text()).toBe("pong");

  expect(() => transport.install(target)).toThrow(MockStoreError);

  transport.restore();
  expect(target.fetch).toBeUndefined();
});
