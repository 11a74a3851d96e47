import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { anonymousUser, authorizedUser, DecodeError, resolveSections } from "@mobile-sdui/core";
import { ValidationError } from "../errors.js";
import { createSectionStore } from "../models/sections.js";
import { createTestContext } from "../testUtils.js";
import { loadFixtures, parseFixtures, readFixtureFile } from "./fixtures.js";

const fixtureFile = new URL("../../fixtures/sections.json", import.meta.url);

describe("parseFixtures", () => {
  test("decodes components and defaults visibility to public", () => {
    const [entrypoint] = parseFixtures({
      entrypoints: [
        {
          key: "home",
          sections: [
            {
              component: {
                _serde_union_tag: "SDUIDescriptionComponent",
                _serde_union_content: { text: "Hello" },
              },
            },
          ],
        },
      ],
    });

    assert.equal(entrypoint?.key, "home");
    assert.deepEqual(entrypoint?.sections, [
      {
        visibility: "public",
        component: { kind: "SDUIDescriptionComponent", payload: { text: "Hello" } },
      },
    ]);
  });

  test("rejects a document without entrypoints", () => {
    assert.throws(() => parseFixtures({ sections: [] }), ValidationError);
  });

  test("rejects duplicate entrypoint keys", () => {
    assert.throws(
      () =>
        parseFixtures({
          entrypoints: [
            { key: "home", sections: [] },
            { key: "about", sections: [] },
            { key: "home", sections: [] },
          ],
        }),
      (error: unknown) =>
        error instanceof ValidationError &&
        error.message === 'Invalid fixture file: Duplicate entrypoint key "home"'
    );
  });

  test("rejects an undecodable component", () => {
    assert.throws(
      () =>
        parseFixtures({
          entrypoints: [
            {
              key: "home",
              sections: [
                {
                  component: {
                    _serde_union_tag: "SDUICardComponent",
                    _serde_union_content: { imageUrl: null },
                  },
                },
              ],
            },
          ],
        }),
      (error: unknown) =>
        error instanceof DecodeError &&
        error.kind === "SDUICardComponent" &&
        error.field === "title"
    );
  });
});

test("bundled fixtures load and resolve", async () => {
  const { context, close } = await createTestContext();

  try {
    const fixtures = readFixtureFile(fixtureFile);
    const counts = await loadFixtures(context, fixtures);

    assert.deepEqual(counts, { entrypoints: 4, sections: 8 });

    const store = createSectionStore(context);
    const anonymous = await resolveSections({ store }, anonymousUser(), "home");
    const signedIn = await resolveSections({ store }, authorizedUser("user-1"), "home");

    assert.deepEqual(
      anonymous.map((section) => section.component.kind),
      ["SDUIJumbotronComponent", "SDUIDescriptionComponent", "SDUIScrollViewHorizontalComponent"]
    );
    assert.equal(signedIn.length, 4);
    assert.equal(signedIn[3]?.component.kind, "SDUICardComponent");
  } finally {
    await close();
  }
});

test("loading fixtures twice replaces sections instead of appending", async () => {
  const { context, close } = await createTestContext();

  try {
    const fixtures = readFixtureFile(fixtureFile);
    await loadFixtures(context, fixtures);
    await loadFixtures(context, fixtures);

    const records = await createSectionStore(context).fetchSectionRecords(
      "home",
      anonymousUser()
    );
    assert.equal(records.length, 4);
  } finally {
    await close();
  }
});

function descriptions(key: string, texts: string[]) {
  return parseFixtures({
    entrypoints: [
      {
        key,
        sections: texts.map((text) => ({
          component: {
            _serde_union_tag: "SDUIDescriptionComponent",
            _serde_union_content: { text },
          },
        })),
      },
    ],
  });
}

test("a failed reload keeps the previous sections", async () => {
  const { context, close } = await createTestContext();

  try {
    await loadFixtures(context, descriptions("home", ["old A", "old B"]));

    await assert.rejects(loadFixtures(context, descriptions("home", ["new A", "bad \u0000 text"])));

    const records = await createSectionStore(context).fetchSectionRecords(
      "home",
      anonymousUser()
    );
    assert.deepEqual(
      records.map((record) => record.content),
      [{ text: "old A" }, { text: "old B" }]
    );
  } finally {
    await close();
  }
});
