import { AppConfig } from "../../config/app.config";
import {
  classifySensitivity,
  logGuardrailAction,
  refusalMessage,
  shouldRefuseSensitive,
  validateAnswer,
} from "../guardrails/guardrails.service";
import { Generator } from "../llm/types";
import { describeError } from "../shared/errors";
import { IndexManager, IndexSnapshot } from "../vector/index.manager";
import { extractCitations } from "./citation.extractor";
import { buildContext, buildPrompt } from "./context.builder";
import { AnswerStatus, AskResponse, Passage, PipelineContext } from "./types";

const SUBSTANTIVE_PASSAGE_LENGTH = 50;

export const NOT_READY_MESSAGE =
  "Vector stores not initialized. Please call /embed endpoint first.";
export const ERROR_MESSAGE = "I encountered an error while processing your question.";

export type StageName =
  | "RETRIEVE_AUTHORITATIVE"
  | "CHECK_SENSITIVITY"
  | "RETRIEVE_SUPPLEMENTAL"
  | "GENERATE_ANSWER";

export type PipelineSettings = Pick<
  AppConfig,
  "topK" | "productName" | "sensitiveTopics" | "fabricationIndicators"
>;

export interface PipelineDeps {
  indexes: IndexSnapshot;
  generator: Generator;
  settings: PipelineSettings;
}

export type PipelineStage = (
  context: PipelineContext,
  deps: PipelineDeps
) => Promise<PipelineContext>;

export function createContext(question: string): PipelineContext {
  return {
    question,
    retrievedAuthoritative: [],
    retrievedSupplemental: [],
    isSensitive: false,
    needsSupplemental: false,
    answer: "",
    status: "processing",
    citations: [],
  };
}

function hasSubstantivePassage(passages: Passage[]): boolean {
  return passages.some(
    (passage) => passage.content.trim().length > SUBSTANTIVE_PASSAGE_LENGTH
  );
}

function terminate(
  context: PipelineContext,
  status: AnswerStatus,
  answer: string
): PipelineContext {
  return { ...context, status, answer, citations: [] };
}

export const retrieveAuthoritative: PipelineStage = async (context, deps) => {
  const passages = await deps.indexes.authoritative.similaritySearch(
    context.question,
    deps.settings.topK
  );

  return {
    ...context,
    retrievedAuthoritative: passages,
    needsSupplemental: !hasSubstantivePassage(passages),
  };
};

export const checkSensitivity: PipelineStage = async (context, deps) => ({
  ...context,
  isSensitive: classifySensitivity(context.question, deps.settings.sensitiveTopics),
});

export const retrieveSupplemental: PipelineStage = async (context, deps) => {
  if (!context.needsSupplemental || context.isSensitive || !deps.indexes.supplemental) {
    return { ...context, retrievedSupplemental: [] };
  }

  console.log("Authoritative coverage is thin, querying supplemental sources");
  const passages = await deps.indexes.supplemental.similaritySearch(
    context.question,
    deps.settings.topK
  );
  return { ...context, retrievedSupplemental: passages };
};

export const generateAnswer: PipelineStage = async (context, deps) => {
  const { question } = context;
  const sources = [...context.retrievedAuthoritative, ...context.retrievedSupplemental];

  if (shouldRefuseSensitive(context.isSensitive, context.retrievedAuthoritative.length > 0)) {
    logGuardrailAction("refuse", question, "sensitive_no_facts");
    return terminate(context, "refused_sensitive", refusalMessage("sensitive"));
  }

  if (sources.length === 0) {
    logGuardrailAction("refuse", question, "no_sources");
    return terminate(context, "insufficient_info", refusalMessage("insufficient_info"));
  }

  let answer: string;
  try {
    const prompt = buildPrompt(question, buildContext(sources), deps.settings.productName);
    const startGeneration = Date.now();
    answer = await deps.generator.generate(prompt);
    console.log(`Answer generated in ${Date.now() - startGeneration}ms`);
  } catch (error) {
    console.error(`Error generating answer: ${describeError(error)}`);
    return terminate(context, "error", ERROR_MESSAGE);
  }

  if (!validateAnswer(answer, sources, deps.settings.fabricationIndicators)) {
    logGuardrailAction("refuse", question, "validation_failed");
    return terminate(context, "validation_failed", refusalMessage("validation_failed"));
  }

  return {
    ...context,
    answer,
    status: "answered",
    citations: extractCitations(sources),
  };
};

export const PIPELINE_STAGES: ReadonlyArray<{ name: StageName; run: PipelineStage }> = [
  { name: "RETRIEVE_AUTHORITATIVE", run: retrieveAuthoritative },
  { name: "CHECK_SENSITIVITY", run: checkSensitivity },
  { name: "RETRIEVE_SUPPLEMENTAL", run: retrieveSupplemental },
  { name: "GENERATE_ANSWER", run: generateAnswer },
];

/**
 * Runs every stage in order over a fresh context. Any exception from a
 * collaborator ends the run with status `error`.
 */
export async function runPipeline(question: string, deps: PipelineDeps): Promise<PipelineContext> {
  let context = createContext(question);

  for (const stage of PIPELINE_STAGES) {
    const started = Date.now();
    try {
      context = await stage.run(context, deps);
    } catch (error) {
      console.error(`Stage ${stage.name} failed: ${describeError(error)}`);
      return terminate(context, "error", ERROR_MESSAGE);
    }
    console.log(`${stage.name} completed in ${Date.now() - started}ms`);
  }

  return context;
}

function toResponse(context: PipelineContext): AskResponse {
  const status: AnswerStatus = context.status === "processing" ? "error" : context.status;
  return { answer: context.answer, status, citations: context.citations };
}

export class RagPipeline {
  constructor(
    private readonly indexManager: IndexManager,
    private readonly generator: Generator,
    private readonly settings: PipelineSettings
  ) {}

  isReady(): boolean {
    return this.indexManager.isReady();
  }

  async buildIndexes(): Promise<void> {
    await this.indexManager.buildIndexes();
  }

  async ask(question: string): Promise<AskResponse> {
    const indexes = this.indexManager.snapshot();
    if (!indexes) {
      return { answer: NOT_READY_MESSAGE, status: "not_ready", citations: [] };
    }

    const started = Date.now();
    const context = await runPipeline(question, {
      indexes,
      generator: this.generator,
      settings: this.settings,
    });
    console.log(`Question answered with status ${context.status} in ${Date.now() - started}ms`);

    return toResponse(context);
  }
}
