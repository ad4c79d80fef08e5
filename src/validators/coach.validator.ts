import { z } from "zod";
import { Weekday } from "../common/common-enum";

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "startDate must be written as YYYY-MM-DD");

export const coachSettingsSchema = z.object({
  weeks: z.number().int().min(3, "weeks must be at least 3").max(12, "weeks must be at most 12"),
  availableDays: z
    .array(z.nativeEnum(Weekday))
    .min(1, "at least one available day is required")
    .refine((days) => new Set(days).size === days.length, "availableDays must not repeat a day"),
  sessionMinutes: z.number().int().min(15).max(180),
  blocksPerSession: z.number().int().min(1).max(6),
  exercisesPerBlock: z.number().int().min(1).max(6),
  equipment: z.array(z.string().min(1)).min(1, "at least one piece of equipment is required"),
  swimDay: z.nativeEnum(Weekday).optional(),
  preferredExercises: z.array(z.string().min(1)),
});

export const resolvedSettingsSchema = coachSettingsSchema.refine(
  (settings) => !settings.swimDay || settings.availableDays.includes(settings.swimDay),
  { message: "swimDay must be one of the available days", path: ["swimDay"] }
);

export const coachSettingsOverridesSchema = coachSettingsSchema.partial().strict();

export const promptBodySchema = z
  .object({
    settings: coachSettingsOverridesSchema.optional(),
    startDate: isoDate.optional(),
    maxYamlFiles: z.number().int().min(0).max(500).optional(),
  })
  .strict();

export const planCheckBodySchema = z
  .object({
    text: z.string().min(1, "text is required"),
    settings: coachSettingsOverridesSchema.optional(),
  })
  .strict();

export type PromptBody = z.infer<typeof promptBodySchema>;
export type PlanCheckBody = z.infer<typeof planCheckBodySchema>;
