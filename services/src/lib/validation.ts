import { z } from "zod";

export const MAX_AMOUNT = 999999.99;

export const roundToCents = (value: number) => Math.round(value * 100) / 100;

/** Checked after rounding, so "0.004" is zero rather than a positive amount. */
export const isAmountInRange = (value: number) => value > 0 && value <= MAX_AMOUNT;

const codePointLength = (value: string) => Array.from(value).length;

const boundedText = (min: number, max: number, message: string) =>
  z.string().refine((value) => {
    const length = codePointLength(value);
    return length >= min && length <= max;
  }, message);

export const AmountSchema = z
  .string()
  .trim()
  .regex(/^(?:\d+(?:[.,]\d*)?|[.,]\d+)$/, "Amount must be a number")
  .transform((value) => roundToCents(Number(value.replace(",", "."))))
  .refine(isAmountInRange, `Amount must be within (0, ${MAX_AMOUNT}]`);

export const ProjectNameSchema = boundedText(1, 255, "Project name must be 1-255 characters");
export const ProjectAddressSchema = boundedText(5, 512, "Project address must be 5-512 characters");
export const TaskTitleSchema = boundedText(1, 255, "Task title must be 1-255 characters");

/** Parses "1250.50" or "1250,50"; null when outside (0, 999999.99]. */
export function parseAmount(text: string | undefined): number | null {
  const parsed = AmountSchema.safeParse(text ?? "");
  return parsed.success ? parsed.data : null;
}

export function isValidProjectName(text: string | undefined): text is string {
  return ProjectNameSchema.safeParse(text).success;
}

export function isValidProjectAddress(text: string | undefined): text is string {
  return ProjectAddressSchema.safeParse(text).success;
}

export function isValidTaskTitle(text: string | undefined): text is string {
  return TaskTitleSchema.safeParse(text).success;
}
