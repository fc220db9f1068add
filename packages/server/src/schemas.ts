/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { isIsoDate, tryParseTimeOfDay, MAX_DURATION_MINUTES } from "@studylog/sdk";

// Maximum accepted import payload (5MB of text)
export const MAX_PAYLOAD_LENGTH = 5 * 1024 * 1024;

// Maximum sessions returned by list_sessions
export const MAX_LIST_LIMIT = 1000;

const idPattern = /^[A-Za-z0-9][A-Za-z0-9._:-]*$/;

export const SessionIdSchema = z.string().min(1).max(200).superRefine((val, ctx) => {
  if (!idPattern.test(val)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "id must start with alphanumeric and contain only letters, numbers, dots, colons, underscores, and hyphens",
    });
  }
});

export const DateSchema = z.string().superRefine((val, ctx) => {
  if (!isIsoDate(val)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be a calendar date in YYYY-MM-DD form",
    });
  }
});

export const TimeSchema = z.string().superRefine((val, ctx) => {
  if (tryParseTimeOfDay(val) === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be a time in HH:MM or HH:MM:SS form",
    });
  }
});

const SubjectSchema = z.string().max(500).refine((val) => val.trim() !== "", {
  message: "subject cannot be empty",
});

const DurationSchema = z.number().int().positive().max(MAX_DURATION_MINUTES);

const NotesSchema = z.string().max(10000);

/**
 * Reject ranges whose lower bound is after the upper bound
 */
function checkRange(range: { from?: string; to?: string }, ctx: z.RefinementCtx): void {
  if (range.from !== undefined && range.to !== undefined && range.from > range.to) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["from"],
      message: "from must not be after to",
    });
  }
}

// Tool input schemas

export const AddSessionInputSchema = z.object({
  subject: SubjectSchema,
  durationMinutes: DurationSchema,
  date: DateSchema.optional(),
  startTime: TimeSchema.nullish(),
  endTime: TimeSchema.nullish(),
  notes: NotesSchema.nullish(),
});

export const GetSessionInputSchema = z.object({
  id: SessionIdSchema,
});

export const UpdateSessionInputSchema = z
  .object({
    id: SessionIdSchema,
    subject: SubjectSchema.optional(),
    durationMinutes: DurationSchema.optional(),
    date: DateSchema.optional(),
    startTime: TimeSchema.nullable().optional(),
    endTime: TimeSchema.nullable().optional(),
    notes: NotesSchema.nullable().optional(),
  })
  .superRefine((input, ctx) => {
    if (Object.entries(input).every(([key, value]) => key === "id" || value === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "update requires at least one field besides id",
      });
    }
  });

export const RemoveSessionInputSchema = z.object({
  id: SessionIdSchema,
});

export const ListSessionsInputSchema = z
  .object({
    subject: z.string().max(500).optional(),
    from: DateSchema.optional(),
    to: DateSchema.optional(),
    limit: z.number().int().min(1).max(MAX_LIST_LIMIT).default(100),
  })
  .superRefine(checkRange);

export const SessionStatsInputSchema = z
  .object({
    from: DateSchema.optional(),
    to: DateSchema.optional(),
  })
  .superRefine(checkRange);

export const ExportSessionsInputSchema = z.object({
  layout: z.enum(["compact", "pretty"]).default("compact"),
});

export const ImportSessionsInputSchema = z.object({
  payload: z.string().min(2).max(MAX_PAYLOAD_LENGTH),
  onConflict: z.enum(["skip", "replace", "error"]).default("skip"),
});

// Type exports
export type AddSessionInput = z.infer<typeof AddSessionInputSchema>;
export type UpdateSessionInput = z.infer<typeof UpdateSessionInputSchema>;
export type ListSessionsInput = z.infer<typeof ListSessionsInputSchema>;
export type SessionStatsInput = z.infer<typeof SessionStatsInputSchema>;
export type ImportSessionsInput = z.infer<typeof ImportSessionsInputSchema>;
