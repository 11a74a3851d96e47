import {
  DecodeResolutionError,
  InvalidEntrypointKeyError,
  SectionDecodeError,
  StorageResolutionError,
} from "./errors.js";
import type { User } from "./identity.js";
import { buildSection, type RawSectionRecord, type Section } from "./section.js";
import { defaultVisibilityPolicy, type VisibilityPolicy } from "./visibility.js";

/**
 * Storage collaborator. Must return records in persisted order. The user is
 * passed through so an implementation may narrow the query; the visibility
 * policy is still applied to whatever it returns.
 */
export interface SectionStore {
  fetchSectionRecords(entrypointKey: string, user: User): Promise<RawSectionRecord[]>;
}

export interface ResolveSectionsOptions {
  store: SectionStore;
  visibilityPolicy?: VisibilityPolicy;
}

/**
 * Loads the sections of an entrypoint in persisted order, hiding the ones the
 * user may not see. One undecodable record fails the whole call. The key is
 * used as given; only a blank key is rejected.
 *
 * @throws InvalidEntrypointKeyError when the key is blank
 * @throws StorageResolutionError when the store rejects
 * @throws DecodeResolutionError when a visible record cannot be decoded
 */
export async function resolveSections(
  options: ResolveSectionsOptions,
  user: User,
  entrypointKey: string
): Promise<Section[]> {
  if (!entrypointKey.trim()) throw new InvalidEntrypointKeyError(entrypointKey);

  let records: RawSectionRecord[];
  try {
    records = await options.store.fetchSectionRecords(entrypointKey, user);
  } catch (error) {
    throw new StorageResolutionError(entrypointKey, error);
  }
  if (records.length === 0) return [];

  const isVisible = options.visibilityPolicy ?? defaultVisibilityPolicy;
  const sections: Section[] = [];
  for (const record of records) {
    if (!isVisible(user, record.visibility)) continue;
    try {
      sections.push(buildSection(record));
    } catch (error) {
      if (error instanceof SectionDecodeError) throw new DecodeResolutionError(entrypointKey, error);
      throw error;
    }
  }
  return sections;
}
