import { describe, expect, it } from "vitest";

import { extractJsonFromMarkdown, interpretVoiceExpense } from "@/lib/openai";
import { VoiceExpenseError } from "@/types/openai";

describe("interpretVoiceExpense", () => {
  it("rounds the amount and trims the description", () => {
    expect(
      interpretVoiceExpense({ amount: 250.456, category: "materials", description: "  цемент М500 ", confidence: 0.9 })
    ).toEqual({ amount: 250.46, category: "materials", description: "цемент М500", confidence: 0.9 });
  });

  it("treats low confidence as not understood", () => {
    expect(interpretVoiceExpense({ amount: 100, category: "labor", description: "x", confidence: 0.3 })).toBeNull();
    expect(interpretVoiceExpense({ amount: 100, category: "labor", description: "x", confidence: 0.5 })).toMatchObject({
      amount: 100,
    });
  });

  it.each([0, -5, 0.004, 1_000_000])("drops an out-of-range amount of %s", (amount) => {
    expect(interpretVoiceExpense({ amount, category: "other", description: "x", confidence: 0.9 })).toBeNull();
  });

  it("throws a typed error for a malformed payload", () => {
    let caught: unknown;
    try {
      interpretVoiceExpense({ amount: "сто", category: "food", description: "x", confidence: 2 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(VoiceExpenseError);
    expect(caught instanceof VoiceExpenseError ? caught.code : null).toBe("INVALID_RESPONSE_SCHEMA");
  });
});

describe("extractJsonFromMarkdown", () => {
  it("unwraps fenced blocks", () => {
    expect(extractJsonFromMarkdown('```json\n{"amount": 5}\n```')).toBe('{"amount": 5}');
  });

  it("cuts the object out of surrounding prose", () => {
    expect(extractJsonFromMarkdown('Ответ: {"amount": 5} готово')).toBe('{"amount": 5}');
  });

  it("returns plain text unchanged apart from whitespace", () => {
    expect(extractJsonFromMarkdown("  нет данных ")).toBe("нет данных");
    expect(extractJsonFromMarkdown("")).toBe("");
  });
});
