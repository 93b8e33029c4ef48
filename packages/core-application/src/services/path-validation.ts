import { z } from "zod";

export type ValidationResult = { ok: true; value: string } | { ok: false; message: string };

const hasNoParentSegment = (value: string) => !value.split("/").includes("..");

export const filePathSchema = z
  .string()
  .min(1, "Path cannot be empty")
  .refine((v) => !v.startsWith("/") && !v.endsWith("/"), "Path cannot start or end with a /")
  .refine(hasNoParentSegment, "Path cannot contain ..");

export const directoryPathSchema = z
  .string()
  .refine((v) => !v.startsWith("/"), "Path cannot start with a /")
  .refine(hasNoParentSegment, "Path cannot contain ..");

export const entryNameSchema = z
  .string()
  .min(1, "Name cannot be empty")
  .refine((v) => !v.includes("/"), "Name cannot contain a /")
  .refine((v) => v !== "." && v !== "..", "Name cannot be . or ..");

export const secretSchema = z.string().min(1, "The password field cannot be empty");

function check(schema: z.ZodType<string>, value: string): ValidationResult {
  const result = schema.safeParse(value);
  if (result.success) return { ok: true, value: result.data };
  return { ok: false, message: result.error.issues[0]?.message ?? "Invalid value" };
}

export const validateFilePath = (value: string) => check(filePathSchema, value);
export const validateDirectoryPath = (value: string) => check(directoryPathSchema, value);
export const validateEntryName = (value: string) => check(entryNameSchema, value);
export const validateSecret = (value: string) => check(secretSchema, value);
