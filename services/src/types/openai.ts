import { z } from "zod";

import { TRANSACTION_CATEGORIES } from "@/types/domain";

// Shape the model is asked to return for a spoken expense.
export const VoiceExpenseResponseSchema = z.object({
  amount: z.number().describe("Expense amount in BYN"),
  category: z.enum(TRANSACTION_CATEGORIES).describe("materials, labor or other"),
  description: z.string().describe("Short description of what was paid for"),
  confidence: z.number().min(0).max(1).describe("Parsing confidence between 0 and 1"),
});

export type VoiceExpenseResponse = z.infer<typeof VoiceExpenseResponseSchema>;

export interface ParsedVoiceExpense {
  amount: number;
  category: VoiceExpenseResponse["category"];
  description: string;
  confidence: number;
}

export type VoiceErrorCode =
  | "MISSING_API_KEY"
  | "TRANSCRIPTION_FAILED"
  | "NO_OUTPUT"
  | "INVALID_JSON"
  | "INVALID_RESPONSE_SCHEMA";

export class VoiceExpenseError extends Error {
  constructor(
    message: string,
    public readonly code: VoiceErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "VoiceExpenseError";
  }
}

export const MIN_CONFIDENCE = 0.5;
export const TRANSCRIPTION_LANGUAGE = "ru" as const;
