import { z } from "zod";
import { LOCALES } from "../i18n/messages.js";

export const ConfigSchema = z.object({
  notesFile: z.string().min(1).default("notes.txt"),
  locale: z.enum(LOCALES).default("ru"),
  logFile: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
