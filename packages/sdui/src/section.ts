import {
  type Component,
  type ComponentResponse,
  decodeComponent,
  toComponentResponse,
} from "./component.js";
import { DecodeError, SectionDecodeError } from "./errors.js";
import type { SectionVisibility } from "./visibility.js";

/** A section row as handed over by the storage layer. */
export interface RawSectionRecord {
  id: string;
  tag: string;
  content: unknown;
  visibility: SectionVisibility;
}

export interface Section {
  readonly id: string;
  readonly component: Component;
}

export interface SectionResponse {
  id: string;
  component: ComponentResponse;
}

export function buildSection(record: RawSectionRecord): Section {
  try {
    return Object.freeze({ id: record.id, component: decodeComponent(record.tag, record.content) });
  } catch (error) {
    if (error instanceof DecodeError) throw new SectionDecodeError(record.id, error);
    throw error;
  }
}

export function toSectionResponse(section: Section): SectionResponse {
  return { id: section.id, component: toComponentResponse(section.component) };
}
