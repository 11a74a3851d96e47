import { z } from "zod/v4";
import { requiredText } from "./fields.js";

export const SDUI_DESCRIPTION_COMPONENT = "SDUIDescriptionComponent";

export const descriptionComponentSchema = z.object({
  text: requiredText,
});

export type SDUIDescriptionComponent = z.output<typeof descriptionComponentSchema>;

export const descriptionComponentResponseSchema = descriptionComponentSchema.extend({
  __typename: z.literal(SDUI_DESCRIPTION_COMPONENT),
});
