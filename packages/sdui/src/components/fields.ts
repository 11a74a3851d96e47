import { z } from "zod/v4";

export const requiredText = z.string().trim().min(1);

export const optionalText = z.string().trim().min(1).nullable().default(null);

export const httpUrl = z.url({ protocol: /^https?$/ });

export const optionalHttpUrl = httpUrl.nullable().default(null);
