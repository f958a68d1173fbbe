import { z } from "zod";
import { parseSeverity, Severity } from "../core/severity.js";

const severity = z.union([
  z.nativeEnum(Severity),
  z.string().transform((value, ctx) => {
    const level = parseSeverity(value);
    if (level === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown severity "${value}"` });
      return z.NEVER;
    }
    return level;
  }),
]);

export const destinationSchema = z.union([
  z.enum(["stderr", "stdout"]),
  z.object({ file: z.string().min(1) }).strict(),
]);

export const loggerConfigSchema = z
  .object({
    name: z.string().min(1).optional(),
    level: severity.optional(),
    dateFormat: z.string().optional(),
    utc: z.boolean().optional(),
    hexRendering: z.enum(["verbatim", "numeric"]).optional(),
    destination: destinationSchema.optional(),
  })
  .strict();
