import {
  encodeComponent,
  isSectionVisibility,
  type Component,
  type RawSectionRecord,
  type SectionStore,
  type SectionVisibility,
} from "@mobile-sdui/core";
import { asc, eq, max } from "drizzle-orm";
import { entrypoints, sections } from "../db/schema.js";
import type { Context } from "../types.js";

/**
 * Postgres-backed section store. Rows come back ordered by `position`, which
 * is the order the client renders them in.
 */
export function createSectionStore(context: Context): SectionStore {
  return {
    async fetchSectionRecords(entrypointKey) {
      const rows = await context.db
        .select({
          id: sections.id,
          tag: sections.componentTag,
          content: sections.componentContent,
          visibility: sections.visibility,
        })
        .from(sections)
        .where(eq(sections.entrypointKey, entrypointKey))
        .orderBy(asc(sections.position));
      return rows.map(
        (row): RawSectionRecord => ({
          id: row.id,
          tag: row.tag,
          content: row.content,
          visibility: isSectionVisibility(row.visibility) ? row.visibility : "authorized",
        })
      );
    },
  };
}

export async function upsertEntrypoint(
  context: Context,
  key: string,
  description?: string
): Promise<void> {
  await context.db
    .insert(entrypoints)
    .values({ key, description: description ?? null })
    .onConflictDoUpdate({ target: entrypoints.key, set: { description: description ?? null } });
}

/** Appends a section after the current last one of the entrypoint. */
export async function appendSection(
  context: Context,
  entrypointKey: string,
  component: Component,
  visibility: SectionVisibility = "public"
): Promise<string> {
  const [last] = await context.db
    .select({ position: max(sections.position) })
    .from(sections)
    .where(eq(sections.entrypointKey, entrypointKey));
  const encoded = encodeComponent(component);
  const [row] = await context.db
    .insert(sections)
    .values({
      entrypointKey,
      position: (last?.position ?? -1) + 1,
      componentTag: encoded._serde_union_tag,
      componentContent: encoded._serde_union_content,
      visibility,
    })
    .returning({ id: sections.id });
  if (!row) throw new Error(`Failed to append section to ${entrypointKey}`);
  return row.id;
}

export async function deleteEntrypointSections(
  context: Context,
  entrypointKey: string
): Promise<void> {
  await context.db.delete(sections).where(eq(sections.entrypointKey, entrypointKey));
}
