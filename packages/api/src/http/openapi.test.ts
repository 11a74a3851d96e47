import assert from "node:assert/strict";
import { test } from "node:test";
import { componentKinds } from "@mobile-sdui/core";
import { generateOpenApiDocument } from "./openapi.js";

function at(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (!current || typeof current !== "object") return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

function keysOf(value: unknown): string[] {
  return value && typeof value === "object" ? Object.keys(value) : [];
}

const document = JSON.parse(JSON.stringify(generateOpenApiDocument("http://localhost:9090/api")));

test("documents every route", () => {
  assert.deepEqual(keysOf(at(document, "paths")).sort(), [
    "/health",
    "/mobile/authorize",
    "/mobile/deauthorize",
    "/mobile/entrypoint-sections",
    "/whoami",
  ]);
  assert.equal(at(document, "paths", "/mobile/authorize", "post", "operationId"), "authorizeMobile");
  assert.equal(at(document, "servers", 0, "url"), "http://localhost:9090/api");
});

test("the entrypoint key is a required query parameter", () => {
  const parameters = at(document, "paths", "/mobile/entrypoint-sections", "get", "parameters");

  assert.deepEqual(parameters, [
    { name: "key", in: "query", required: true, schema: { type: "string" } },
  ]);
});

test("publishes the component union with one schema per kind", () => {
  const union = at(document, "components", "schemas", "SDUIComponent");

  assert.deepEqual(
    at(union, "oneOf"),
    componentKinds.map((kind) => ({ $ref: `#/components/schemas/${kind}` }))
  );
  assert.equal(at(union, "discriminator", "propertyName"), "__typename");
  for (const kind of componentKinds) {
    assert.equal(
      at(document, "components", "schemas", kind, "properties", "__typename", "const"),
      kind
    );
  }
});

test("sections reference the component union", () => {
  assert.deepEqual(at(document, "components", "schemas", "SDUISection", "properties", "component"), {
    $ref: "#/components/schemas/SDUIComponent",
  });
  assert.deepEqual(
    at(
      document,
      "paths",
      "/mobile/entrypoint-sections",
      "get",
      "responses",
      "200",
      "content",
      "application/json",
      "schema",
      "properties",
      "sections",
      "items"
    ),
    { $ref: "#/components/schemas/SDUISection" }
  );
});

test("zod request bodies are converted to JSON schema", () => {
  const schema = at(
    document,
    "paths",
    "/mobile/authorize",
    "post",
    "requestBody",
    "content",
    "application/json",
    "schema"
  );

  assert.equal(at(schema, "type"), "object");
  assert.deepEqual(at(schema, "required"), ["googleIdToken"]);
  assert.equal(at(schema, "$schema"), undefined);
});
