import { z } from "zod/v4";
import { optionalHttpUrl, optionalText, requiredText } from "./fields.js";

export const SDUI_CARD_COMPONENT = "SDUICardComponent";

/**
 * A tappable card. When `entrypointKey` is set the client opens that entrypoint
 * on tap.
 */
export const cardComponentSchema = z.object({
  title: requiredText,
  imageUrl: optionalHttpUrl,
  entrypointKey: optionalText,
});

export type SDUICardComponent = z.output<typeof cardComponentSchema>;

export const cardComponentResponseSchema = cardComponentSchema.extend({
  __typename: z.literal(SDUI_CARD_COMPONENT),
});
