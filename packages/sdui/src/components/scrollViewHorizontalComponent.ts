import { z } from "zod/v4";
import { cardComponentSchema } from "./cardComponent.js";
import { optionalText } from "./fields.js";

export const SDUI_SCROLL_VIEW_HORIZONTAL_COMPONENT = "SDUIScrollViewHorizontalComponent";

// Cards are embedded inline; they are not tagged union members here.
export const scrollViewHorizontalComponentSchema = z.object({
  title: optionalText,
  cards: z.array(cardComponentSchema).min(1),
});

export type SDUIScrollViewHorizontalComponent = z.output<
  typeof scrollViewHorizontalComponentSchema
>;

export const scrollViewHorizontalComponentResponseSchema =
  scrollViewHorizontalComponentSchema.extend({
    __typename: z.literal(SDUI_SCROLL_VIEW_HORIZONTAL_COMPONENT),
  });
