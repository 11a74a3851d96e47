import { z } from "zod/v4";
import { optionalHttpUrl, optionalText, requiredText } from "./fields.js";

export const SDUI_JUMBOTRON_COMPONENT = "SDUIJumbotronComponent";

export const jumbotronComponentSchema = z.object({
  title: requiredText,
  subtitle: optionalText,
  imageUrl: optionalHttpUrl,
});

export type SDUIJumbotronComponent = z.output<typeof jumbotronComponentSchema>;

export const jumbotronComponentResponseSchema = jumbotronComponentSchema.extend({
  __typename: z.literal(SDUI_JUMBOTRON_COMPONENT),
});
