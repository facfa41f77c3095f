import { z } from "zod";
import { CollaboratorError } from "../errors";
import { extractTranslatablePayload, localizeReport, type LocalizedReport } from "../pipeline/report";
import type { AuditReport } from "../types";
import type { ChatClient } from "./chat-client";

/** Translates rationale strings; must return one string per input, in order. */
export interface ReportTranslator {
  translate(texts: string[], language: string): Promise<string[]>;
}

const TRANSLATOR_SYSTEM = `You translate security audit rationales.
You receive a JSON array of English strings and a target language code.
Reply with a JSON array of the same length containing the translations, in the same order.
Keep identifiers, function names, state keys, numbers and anything in quotes unchanged.`;

const TranslationSchema = z.array(z.string());

export class ChatReportTranslator implements ReportTranslator {
  constructor(private readonly client: ChatClient) {}

  async translate(texts: string[], language: string): Promise<string[]> {
    const reply = await this.client.complete([
      { role: "system", content: TRANSLATOR_SYSTEM },
      { role: "user", content: `LANG: ${language}\n${JSON.stringify(texts)}` },
    ]);
    return parseTranslation(reply, texts.length);
  }
}

export function parseTranslation(reply: string, expected: number): string[] {
  const text = reply.trim().replace(/^```(?:json)?\s*/i, "").replace(/\s*```$/, "").trim();
  const start = text.indexOf("[");
  const end = text.lastIndexOf("]");
  if (start < 0 || end < start) {
    throw new CollaboratorError("translator reply did not contain a JSON array");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (err) {
    throw new CollaboratorError("translator reply is not valid JSON", { cause: err });
  }

  const parsed = TranslationSchema.safeParse(raw);
  if (!parsed.success || parsed.data.length !== expected) {
    throw new CollaboratorError(`translator must return ${expected} string(s)`);
  }
  return parsed.data;
}

/**
 * Localized view of a report. Only rationale text is sent out; the report
 * itself, and therefore its hash, is untouched.
 */
export async function translateReport(
  report: AuditReport,
  translator: ReportTranslator,
  language: string
): Promise<LocalizedReport> {
  const payload = extractTranslatablePayload(report);
  if (language === "en" || payload.length === 0) {
    return localizeReport(report, payload, language);
  }

  const translated = await translator.translate(payload, language);
  if (translated.length !== payload.length) {
    throw new CollaboratorError(`translator returned ${translated.length} of ${payload.length} rationale(s)`);
  }
  return localizeReport(report, translated, language);
}
