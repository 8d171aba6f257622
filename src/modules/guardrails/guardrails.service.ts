import {
  DEFAULT_FABRICATION_INDICATORS,
  DEFAULT_SENSITIVE_TOPICS,
} from "../../config/app.config";
import { Passage } from "../rag/types";

export type RefusalKind = "sensitive" | "insufficient_info" | "validation_failed" | "other";

export interface ValidationOutcome {
  valid: boolean;
  reason?: "no_sources" | "fabrication_indicator" | "unsupported_number";
  details: string[];
}

const NUMBER_PATTERN = /\d[\d,]*(?:\.\d+)?/g;
const SMALL_NUMBER_LIMIT = 100;
const YEAR_RANGE = { min: 1900, max: 2030 };
const AUDIT_QUESTION_LENGTH = 100;

export function classifySensitivity(
  question: string,
  sensitiveTopics: readonly string[] = DEFAULT_SENSITIVE_TOPICS
): boolean {
  const lower = question.toLowerCase();
  const match = sensitiveTopics.find((topic) => lower.includes(topic.toLowerCase()));

  if (match !== undefined) {
    console.log(`Question flagged as sensitive (topic "${match}")`);
    return true;
  }
  return false;
}

export function extractNumericTokens(text: string): string[] {
  return (text.match(NUMBER_PATTERN) ?? []).map((token) => token.replace(/,+$/, ""));
}

function isPlausibleYear(token: string, value: number): boolean {
  return /^\d{4}$/.test(token) && value >= YEAR_RANGE.min && value <= YEAR_RANGE.max;
}

/**
 * Numbers the answer states that the sources never mention. Small numbers
 * and plausible years are not reported. This is a string-containment
 * heuristic, not a proof of grounding. Citation markers in the answer are
 * scanned too, so a doc id such as E150 yields the token "150".
 */
export function findUnsupportedNumbers(answer: string, sourceText: string): string[] {
  const unsupported: string[] = [];

  for (const token of extractNumericTokens(answer)) {
    if (sourceText.includes(token)) continue;

    const value = Number(token.replace(/,/g, ""));
    if (!Number.isFinite(value)) continue;
    if (value < SMALL_NUMBER_LIMIT) continue;
    if (isPlausibleYear(token, value)) continue;

    unsupported.push(token);
  }

  return unsupported;
}

export function checkAnswer(
  answer: string,
  sources: Passage[],
  fabricationIndicators: readonly string[] = DEFAULT_FABRICATION_INDICATORS
): ValidationOutcome {
  if (sources.length === 0) {
    return { valid: false, reason: "no_sources", details: [] };
  }

  const sourceText = sources.map((passage) => passage.content).join(" ").toLowerCase();
  const answerLower = answer.toLowerCase();

  const indicators = fabricationIndicators.filter(
    (indicator) => answerLower.includes(indicator) && !sourceText.includes(indicator)
  );
  if (indicators.length > 0) {
    return { valid: false, reason: "fabrication_indicator", details: indicators };
  }

  const numbers = findUnsupportedNumbers(answer, sourceText);
  if (numbers.length > 0) {
    return { valid: false, reason: "unsupported_number", details: numbers };
  }

  return { valid: true, details: [] };
}

export function validateAnswer(
  answer: string,
  sources: Passage[],
  fabricationIndicators: readonly string[] = DEFAULT_FABRICATION_INDICATORS
): boolean {
  const outcome = checkAnswer(answer, sources, fabricationIndicators);
  if (!outcome.valid) {
    const details = outcome.details.length > 0 ? `: ${outcome.details.join(", ")}` : "";
    console.warn(`Answer validation failed (${outcome.reason})${details}`);
  }
  return outcome.valid;
}

export function shouldRefuseSensitive(
  isSensitive: boolean,
  hasAuthoritativePassages: boolean
): boolean {
  return isSensitive && !hasAuthoritativePassages;
}

export function refusalMessage(kind: RefusalKind): string {
  switch (kind) {
    case "sensitive":
      return (
        "I cannot provide information about pricing, warranty, or technical " +
        "specifications as this information is not available in my reliable sources."
      );
    case "insufficient_info":
      return "I don't have enough information to answer this question safely.";
    case "validation_failed":
      return (
        "I cannot provide a reliable answer based on the available sources. " +
        "Please try rephrasing your question or ask about topics covered in " +
        "the reliable documentation."
      );
    default:
      return "I cannot provide information on this topic.";
  }
}

export function formatGuardrailAction(action: string, question: string, reason: string): string {
  return `Guardrail action: ${action} | Question: ${question.slice(0, AUDIT_QUESTION_LENGTH)}... | Reason: ${reason}`;
}

export function logGuardrailAction(action: string, question: string, reason: string): void {
  console.log(formatGuardrailAction(action, question, reason));
}
