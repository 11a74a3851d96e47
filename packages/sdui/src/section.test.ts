import assert from "node:assert/strict";
import { test } from "node:test";
import { DecodeError, SectionDecodeError, UnknownComponentKindError } from "./errors.js";
import { buildSection, toSectionResponse } from "./section.js";

test("buildSection keeps the record id and decodes the component", () => {
  const section = buildSection({
    id: "section-1",
    tag: "SDUIDescriptionComponent",
    content: { text: "Open daily" },
    visibility: "public",
  });

  assert.deepEqual(section, {
    id: "section-1",
    component: { kind: "SDUIDescriptionComponent", payload: { text: "Open daily" } },
  });
});

test("buildSection annotates decode failures with the section id", () => {
  assert.throws(
    () =>
      buildSection({
        id: "section-9",
        tag: "SDUICardComponent",
        content: { imageUrl: "https://img.example.com/a.png" },
        visibility: "public",
      }),
    (error: unknown) => {
      assert.ok(error instanceof SectionDecodeError);
      assert.equal(error.sectionId, "section-9");
      assert.ok(error.decodeError instanceof DecodeError);
      assert.equal(error.decodeError.kind, "SDUICardComponent");
      assert.equal(error.decodeError.field, "title");
      assert.equal(error.cause, error.decodeError);
      return true;
    }
  );
});

test("buildSection keeps the unknown kind code", () => {
  assert.throws(
    () => buildSection({ id: "s", tag: "SDUIMapComponent", content: {}, visibility: "public" }),
    (error: unknown) =>
      error instanceof SectionDecodeError &&
      error.code === "UNKNOWN_COMPONENT_KIND" &&
      error.decodeError instanceof UnknownComponentKindError
  );
});

test("toSectionResponse flattens the component", () => {
  const section = buildSection({
    id: "section-2",
    tag: "SDUICardComponent",
    content: { title: "Tacos", entrypointKey: "com.example.Tacos" },
    visibility: "authorized",
  });

  assert.deepEqual(toSectionResponse(section), {
    id: "section-2",
    component: {
      __typename: "SDUICardComponent",
      title: "Tacos",
      imageUrl: null,
      entrypointKey: "com.example.Tacos",
    },
  });
});
