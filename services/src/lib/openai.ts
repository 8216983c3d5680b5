import OpenAI, { toFile } from "openai";
import type { ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";

import { logger } from "@/lib/logger";
import { getEnv } from "@/lib/env";
import { isAmountInRange, roundToCents } from "@/lib/validation";
import {
  MIN_CONFIDENCE,
  type ParsedVoiceExpense,
  TRANSCRIPTION_LANGUAGE,
  VoiceExpenseError,
  VoiceExpenseResponseSchema,
} from "@/types/openai";

/** Speech-to-expense pipeline used by the voice input dialog. */
export interface VoiceExpenseService {
  transcribe(audio: Buffer, fileName: string): Promise<string>;
  parseExpense(text: string): Promise<ParsedVoiceExpense | null>;
}

let openaiClient: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    const { OPENAI_API_KEY } = getEnv();
    if (!OPENAI_API_KEY) {
      throw new VoiceExpenseError("OpenAI API key not configured", "MISSING_API_KEY");
    }
    openaiClient = new OpenAI({ apiKey: OPENAI_API_KEY });
  }
  return openaiClient;
}

const schema = {
  type: "object",
  additionalProperties: false,
  properties: {
    amount: { type: "number" },
    category: { type: "string", enum: ["materials", "labor", "other"] },
    description: { type: "string" },
    confidence: { type: "number", minimum: 0, maximum: 1 },
  },
  required: ["amount", "category", "description", "confidence"],
};

function buildParseRequest(text: string, model: string): ResponseCreateParamsNonStreaming {
  return {
    model,
    temperature: 0.3,
    instructions: "Ты помощник для парсинга расходов строительного проекта. Отвечай только валидным JSON.",
    input: [
      {
        role: "user",
        content: [
          {
            type: "input_text",
            text: `Проанализируй следующий текст расхода и извлеки информацию о расходе.

Текст: ${text}

Поля:
- amount: сумма в BYN
- category: "materials" (материалы), "labor" (работа) или "other" (прочее)
- description: краткое описание
- confidence: уверенность в разборе от 0 до 1

Если разобрать не получается, верни confidence: 0.`,
          },
        ],
      },
    ],
    text: {
      format: {
        type: "json_schema",
        name: "VoiceExpense",
        strict: true,
        schema,
      },
    },
  };
}

/**
 * Validates a raw model payload. Low-confidence answers and amounts outside
 * the accepted expense range read as "not understood".
 */
export function interpretVoiceExpense(payload: unknown): ParsedVoiceExpense | null {
  const parsed = VoiceExpenseResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new VoiceExpenseError("OpenAI response schema validation failed", "INVALID_RESPONSE_SCHEMA", {
      issues: parsed.error.issues,
    });
  }

  const { category, description, confidence } = parsed.data;
  const amount = roundToCents(parsed.data.amount);
  if (confidence < MIN_CONFIDENCE) {
    logger.warn("Low confidence voice expense", { confidence });
    return null;
  }
  if (!isAmountInRange(amount)) {
    logger.warn("Voice expense amount out of range", { amount });
    return null;
  }

  return {
    amount,
    category,
    description: description.trim(),
    confidence,
  };
}

export function extractJsonFromMarkdown(text: string): string {
  if (!text) return text;

  const fenceStart = text.indexOf("```");
  if (fenceStart !== -1) {
    const afterFence = text.slice(fenceStart + 3);
    const firstNewline = afterFence.indexOf("\n");
    const withoutLang = firstNewline !== -1 ? afterFence.slice(firstNewline + 1) : afterFence;
    const fenceEnd = withoutLang.indexOf("```");
    if (fenceEnd !== -1) {
      return withoutLang.slice(0, fenceEnd).trim();
    }
  }

  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    return text.slice(firstBrace, lastBrace + 1).trim();
  }

  return text.trim();
}

export function createOpenAIVoiceService(client: OpenAI = getOpenAIClient()): VoiceExpenseService {
  const { OPENAI_MODEL, OPENAI_TRANSCRIPTION_MODEL } = getEnv();

  return {
    async transcribe(audio, fileName) {
      const startTime = Date.now();
      const transcript = await client.audio.transcriptions.create({
        file: await toFile(audio, fileName),
        model: OPENAI_TRANSCRIPTION_MODEL,
        language: TRANSCRIPTION_LANGUAGE,
      });
      const text = transcript.text.trim();
      if (!text) {
        throw new VoiceExpenseError("Empty transcription", "TRANSCRIPTION_FAILED", { fileName });
      }
      logger.info("Voice message transcribed", {
        fileName,
        durationMs: Date.now() - startTime,
        preview: text.slice(0, 100),
      });
      return text;
    },

    async parseExpense(text) {
      const resp = await client.responses.create(buildParseRequest(text, OPENAI_MODEL));
      const out = resp.output_text;
      if (!out) {
        throw new VoiceExpenseError("No output returned from model", "NO_OUTPUT");
      }

      let payload: unknown;
      try {
        payload = JSON.parse(extractJsonFromMarkdown(out));
      } catch (error) {
        logger.error("Failed to parse JSON from OpenAI response", {
          rawTextPreview: out.slice(0, 500),
          error: error instanceof Error ? error.message : String(error),
        });
        throw new VoiceExpenseError("Failed to parse JSON from OpenAI response", "INVALID_JSON", {
          rawTextPreview: out.slice(0, 500),
        });
      }

      const expense = interpretVoiceExpense(payload);
      logger.info("Voice expense parsed", { understood: expense !== null, model: OPENAI_MODEL });
      return expense;
    },
  };
}

/** Null when no API key is configured; the voice dialog then reports the feature as unavailable. */
export function getVoiceExpenseService(): VoiceExpenseService | null {
  if (!getEnv().OPENAI_API_KEY) {
    logger.warn("OPENAI_API_KEY not set; voice input disabled");
    return null;
  }
  return createOpenAIVoiceService();
}
