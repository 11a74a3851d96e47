import { z } from "zod/v4";
import {
  cardComponentResponseSchema,
  cardComponentSchema,
  SDUI_CARD_COMPONENT,
  type SDUICardComponent,
} from "./components/cardComponent.js";
import {
  descriptionComponentResponseSchema,
  descriptionComponentSchema,
  SDUI_DESCRIPTION_COMPONENT,
  type SDUIDescriptionComponent,
} from "./components/descriptionComponent.js";
import {
  jumbotronComponentResponseSchema,
  jumbotronComponentSchema,
  SDUI_JUMBOTRON_COMPONENT,
  type SDUIJumbotronComponent,
} from "./components/jumbotronComponent.js";
import {
  SDUI_SCROLL_VIEW_HORIZONTAL_COMPONENT,
  type SDUIScrollViewHorizontalComponent,
  scrollViewHorizontalComponentResponseSchema,
  scrollViewHorizontalComponentSchema,
} from "./components/scrollViewHorizontalComponent.js";
import { DecodeError, UnknownComponentKindError } from "./errors.js";

export const COMPONENT_UNION_NAME = "SDUIComponent";
export const COMPONENT_TAG_FIELD = "_serde_union_tag";
export const COMPONENT_CONTENT_FIELD = "_serde_union_content";
export const COMPONENT_TYPENAME_FIELD = "__typename";

/**
 * Payload shape of every component kind, keyed by its discriminator.
 *
 * Adding a kind here without a matching entry in `componentTable` is a type
 * error, so the union, the decoder and the schema cannot drift apart.
 */
export interface ComponentPayloads {
  [SDUI_CARD_COMPONENT]: SDUICardComponent;
  [SDUI_DESCRIPTION_COMPONENT]: SDUIDescriptionComponent;
  [SDUI_JUMBOTRON_COMPONENT]: SDUIJumbotronComponent;
  [SDUI_SCROLL_VIEW_HORIZONTAL_COMPONENT]: SDUIScrollViewHorizontalComponent;
}

export type ComponentKind = keyof ComponentPayloads;

type ComponentMap = {
  [K in ComponentKind]: { readonly kind: K; readonly payload: Readonly<ComponentPayloads[K]> };
};

export type Component = ComponentMap[ComponentKind];

export type ComponentOf<K extends ComponentKind> = ComponentMap[K];

type ComponentResponseMap = {
  [K in ComponentKind]: { [COMPONENT_TYPENAME_FIELD]: K } & ComponentPayloads[K];
};

/** Shape served to clients: the payload fields flattened next to `__typename`. */
export type ComponentResponse = ComponentResponseMap[ComponentKind];

/** Adjacently tagged form used for storage. */
export interface TaggedComponent {
  [COMPONENT_TAG_FIELD]: string;
  [COMPONENT_CONTENT_FIELD]: unknown;
}

interface ComponentDefinition<K extends ComponentKind> {
  description: string;
  schema: z.ZodType<ComponentPayloads[K], unknown>;
  responseSchema: z.ZodType;
}

const componentTable: { readonly [K in ComponentKind]: ComponentDefinition<K> } = {
  [SDUI_CARD_COMPONENT]: {
    description: "Card with a title, an optional image and an optional entrypoint link",
    schema: cardComponentSchema,
    responseSchema: cardComponentResponseSchema,
  },
  [SDUI_DESCRIPTION_COMPONENT]: {
    description: "Plain block of descriptive text",
    schema: descriptionComponentSchema,
    responseSchema: descriptionComponentResponseSchema,
  },
  [SDUI_JUMBOTRON_COMPONENT]: {
    description: "Large header with title, subtitle and background image",
    schema: jumbotronComponentSchema,
    responseSchema: jumbotronComponentResponseSchema,
  },
  [SDUI_SCROLL_VIEW_HORIZONTAL_COMPONENT]: {
    description: "Horizontally scrolling row of cards",
    schema: scrollViewHorizontalComponentSchema,
    responseSchema: scrollViewHorizontalComponentResponseSchema,
  },
};

export const componentKinds: readonly ComponentKind[] = Object.freeze(
  Object.keys(componentTable).filter(isComponentKind)
);

function mapComponentKinds<T>(fn: (kind: ComponentKind) => T): Record<ComponentKind, T> {
  return {
    [SDUI_CARD_COMPONENT]: fn(SDUI_CARD_COMPONENT),
    [SDUI_DESCRIPTION_COMPONENT]: fn(SDUI_DESCRIPTION_COMPONENT),
    [SDUI_JUMBOTRON_COMPONENT]: fn(SDUI_JUMBOTRON_COMPONENT),
    [SDUI_SCROLL_VIEW_HORIZONTAL_COMPONENT]: fn(SDUI_SCROLL_VIEW_HORIZONTAL_COMPONENT),
  };
}

export function isComponentKind(tag: string): tag is ComponentKind {
  return Object.hasOwn(componentTable, tag);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

function decodePayload<T>(kind: string, schema: z.ZodType<T, unknown>, content: unknown): T {
  const parsed = schema.safeParse(content);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : undefined;
    throw new DecodeError(kind, issue?.message || "Invalid component content", field);
  }
  return parsed.data;
}

function decodeKnownComponent<K extends ComponentKind>(
  kind: K,
  content: unknown
): ComponentOf<K> {
  const payload = decodePayload(kind, componentTable[kind].schema, content);
  return deepFreeze({ kind, payload });
}

export function decodeComponent(tag: string, content: unknown): Component {
  if (!isComponentKind(tag)) throw new UnknownComponentKindError(tag);
  return decodeKnownComponent(tag, content);
}

export function decodeTaggedComponent(value: unknown): Component {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new DecodeError(COMPONENT_UNION_NAME, "Expected an object");
  }
  const tag: unknown = Reflect.get(value, COMPONENT_TAG_FIELD);
  if (typeof tag !== "string") {
    throw new DecodeError(COMPONENT_UNION_NAME, "Expected a string tag", COMPONENT_TAG_FIELD);
  }
  if (!(COMPONENT_CONTENT_FIELD in value)) {
    throw new DecodeError(tag, "Missing component content", COMPONENT_CONTENT_FIELD);
  }
  return decodeComponent(tag, Reflect.get(value, COMPONENT_CONTENT_FIELD));
}

export function encodeComponent(component: Component): TaggedComponent {
  return {
    [COMPONENT_TAG_FIELD]: component.kind,
    [COMPONENT_CONTENT_FIELD]: structuredClone(component.payload),
  };
}

function toResponse<K extends ComponentKind>(component: {
  readonly kind: K;
  readonly payload: Readonly<ComponentPayloads[K]>;
}): ComponentResponseMap[K] {
  return { [COMPONENT_TYPENAME_FIELD]: component.kind, ...component.payload };
}

export function toComponentResponse(component: Component): ComponentResponse {
  return toResponse(component);
}

export type JsonSchema = Record<string, unknown>;

export interface ComponentUnionSchema {
  name: typeof COMPONENT_UNION_NAME;
  description: string;
  discriminator: {
    propertyName: typeof COMPONENT_TYPENAME_FIELD;
    mapping: Record<ComponentKind, string>;
  };
  oneOf: Array<{ $ref: string }>;
  variants: Record<ComponentKind, JsonSchema>;
}

function variantJsonSchema(kind: ComponentKind): JsonSchema {
  const { $schema: _ignored, ...schema } = z.toJSONSchema(componentTable[kind].responseSchema);
  return { ...schema, description: componentTable[kind].description };
}

/**
 * Describes the union as a named sum of object shapes, one per kind, in the
 * OpenAPI `oneOf` + `discriminator` form. `refPrefix` is where the caller
 * places the variant schemas.
 */
export function describeComponentSchema(
  refPrefix = "#/components/schemas/"
): ComponentUnionSchema {
  const mapping = mapComponentKinds((kind) => `${refPrefix}${kind}`);
  return {
    name: COMPONENT_UNION_NAME,
    description: "One UI component; `__typename` names the concrete kind",
    discriminator: { propertyName: COMPONENT_TYPENAME_FIELD, mapping },
    oneOf: componentKinds.map((kind) => ({ $ref: mapping[kind] })),
    variants: mapComponentKinds(variantJsonSchema),
  };
}
