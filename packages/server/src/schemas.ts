/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { GROUPING_STRATEGIES, MAX_NAMES } from "@namegroups/sdk";

// Secure pattern that prevents path traversal
const idPattern = /^[A-Za-z0-9]+(?:[._-][A-Za-z0-9]+)*$/;

const IdStringSchema = z.string().min(1).superRefine((val, ctx) => {
  if (!idPattern.test(val)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "id must start with alphanumeric and contain only letters, numbers, dots, underscores, and hyphens",
    });
  }
});

const NamesSchema = z
  .array(z.string().min(1, "names must be non-empty strings"))
  .min(1, "names must contain at least one name")
  .max(MAX_NAMES, `names cannot contain more than ${MAX_NAMES} entries`);

const DelimiterSchema = z.string().length(1, "delimiter must be exactly one character");

// Tool input schemas

export const GroupNamesInputSchema = z.object({
  names: NamesSchema,
  delimiter: DelimiterSchema.optional(),
  strategy: z.enum(GROUPING_STRATEGIES).optional(),
});

export const CreateTaskInputSchema = GroupNamesInputSchema;

export const ListTasksInputSchema = z.object({});

export const GetTaskInputSchema = z.object({
  id: IdStringSchema,
});

export const MoveNameInputSchema = z.object({
  id: IdStringSchema,
  name: z.string().min(1, "name must be a non-empty string"),
  // "" is the key of names that start with the delimiter
  source_group: z.string(),
  target_group: z.string(),
  expected_version: z.number().int().positive().optional(),
});

// Export types
export type GroupNamesInput = z.infer<typeof GroupNamesInputSchema>;
export type CreateTaskInput = z.infer<typeof CreateTaskInputSchema>;
export type GetTaskInput = z.infer<typeof GetTaskInputSchema>;
export type MoveNameInput = z.infer<typeof MoveNameInputSchema>;
