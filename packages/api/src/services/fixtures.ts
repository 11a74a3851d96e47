import fs from "node:fs";
import {
  type Component,
  decodeTaggedComponent,
  type SectionVisibility,
  sectionVisibilities,
} from "@mobile-sdui/core";
import { z } from "zod/v4";
import { ValidationError } from "../errors.js";
import { appendSection, deleteEntrypointSections, upsertEntrypoint } from "../models/sections.js";
import type { Context } from "../types.js";

const FixtureFile = z.object({
  entrypoints: z
    .array(
      z.object({
        key: z.string().trim().min(1),
        description: z.string().optional(),
        sections: z.array(
          z.object({
            visibility: z.enum(sectionVisibilities).default("public"),
            component: z.unknown(),
          })
        ),
      })
    )
    .superRefine((entrypoints, ctx) => {
      const seen = new Set<string>();
      entrypoints.forEach((entrypoint, index) => {
        if (seen.has(entrypoint.key)) {
          ctx.addIssue({
            code: "custom",
            message: `Duplicate entrypoint key "${entrypoint.key}"`,
            path: [index, "key"],
          });
        }
        seen.add(entrypoint.key);
      });
    }),
});

export interface EntrypointFixture {
  key: string;
  description?: string;
  sections: Array<{ visibility: SectionVisibility; component: Component }>;
}

/**
 * Parses a fixture document. Components use the adjacently tagged storage
 * shape and are decoded up front, so a bad fixture never reaches the database.
 */
export function parseFixtures(value: unknown): EntrypointFixture[] {
  const parsed = FixtureFile.safeParse(value);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const reason = issue ? `: ${issue.message}` : "";
    throw new ValidationError(`Invalid fixture file${reason}`, parsed.error.issues);
  }
  return parsed.data.entrypoints.map((entrypoint) => ({
    key: entrypoint.key,
    description: entrypoint.description,
    sections: entrypoint.sections.map((section) => ({
      visibility: section.visibility,
      component: decodeTaggedComponent(section.component),
    })),
  }));
}

export function readFixtureFile(file: string | URL): EntrypointFixture[] {
  return parseFixtures(JSON.parse(fs.readFileSync(file, "utf8")));
}

/**
 * Replaces the sections of every entrypoint named in the fixtures. The whole
 * load is one transaction; a failure leaves the previous sections in place.
 */
export async function loadFixtures(
  context: Context,
  fixtures: EntrypointFixture[]
): Promise<{ entrypoints: number; sections: number }> {
  return await context.db.transaction(async (trx) => {
    const txContext: Context = { ...context, db: trx };
    let sectionCount = 0;
    for (const entrypoint of fixtures) {
      await upsertEntrypoint(txContext, entrypoint.key, entrypoint.description);
      await deleteEntrypointSections(txContext, entrypoint.key);
      for (const section of entrypoint.sections) {
        await appendSection(txContext, entrypoint.key, section.component, section.visibility);
        sectionCount++;
      }
      context.logger.info(
        { event: "fixtures.entrypoint", key: entrypoint.key, sections: entrypoint.sections.length },
        "entrypoint seeded"
      );
    }
    return { entrypoints: fixtures.length, sections: sectionCount };
  });
}
