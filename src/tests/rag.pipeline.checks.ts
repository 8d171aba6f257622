import assert from "node:assert/strict";
import test from "node:test";
import {
  DEFAULT_FABRICATION_INDICATORS,
  DEFAULT_SENSITIVE_TOPICS,
} from "../config/app.config";
import { refusalMessage } from "../modules/guardrails/guardrails.service";
import {
  ERROR_MESSAGE,
  NOT_READY_MESSAGE,
  PipelineDeps,
  PipelineSettings,
  RagPipeline,
  runPipeline,
} from "../modules/rag/rag.pipeline";
import { Passage } from "../modules/rag/types";
import { VectorIndex } from "../modules/vector-db/vector.store";
import { IndexManager } from "../modules/vector/index.manager";
import { KeywordEmbedder, MemorySource, passage, ScriptedGenerator, tempDir } from "./helpers/fakes";

const VOCABULARY = ["battery", "charging", "range", "seat", "cabin", "price", "warranty", "screen"];

const SETTINGS: PipelineSettings = {
  topK: 2,
  productName: "Aurora X1",
  sensitiveTopics: DEFAULT_SENSITIVE_TOPICS,
  fabricationIndicators: DEFAULT_FABRICATION_INDICATORS,
};

const FACTS = [
  passage(
    "authoritative",
    "F1",
    "The battery supports fast charging and a long range on a single charge."
  ),
  passage(
    "authoritative",
    "F2",
    "The seat fabric is recycled and the cabin stays quiet at highway speed."
  ),
];

const SHORT_FACTS = [passage("authoritative", "F1", "Screen brightness adjusts automatically.")];

const EXTERNAL = [
  passage("supplemental", "E1", "Owners report the screen responds quickly even on cold mornings."),
  passage(
    "supplemental",
    "E2",
    "Reviewers liked the cabin materials and the seat bolstering on long drives."
  ),
];

const RANGE_QUESTION = "How long is the battery range when charging?";
const GROUNDED_REPLY = "Fast charging and a long range are supported [authoritative:F1:c1].";

interface TestDeps extends PipelineDeps {
  authoritativeEmbedder: KeywordEmbedder;
  supplementalEmbedder: KeywordEmbedder;
}

async function depsFor(
  facts: Passage[],
  generator: ScriptedGenerator,
  external?: Passage[]
): Promise<TestDeps> {
  const authoritativeEmbedder = new KeywordEmbedder(VOCABULARY);
  const supplementalEmbedder = new KeywordEmbedder(VOCABULARY);
  const authoritative =
    facts.length > 0
      ? await VectorIndex.fromPassages(facts, authoritativeEmbedder)
      : VectorIndex.empty(authoritativeEmbedder);
  const supplemental = external
    ? await VectorIndex.fromPassages(external, supplementalEmbedder)
    : undefined;

  return {
    indexes: { authoritative, supplemental },
    generator,
    settings: SETTINGS,
    authoritativeEmbedder,
    supplementalEmbedder,
  };
}

test("strong authoritative coverage never queries supplemental sources", async () => {
  const generator = new ScriptedGenerator(GROUNDED_REPLY);
  const deps = await depsFor(FACTS, generator, EXTERNAL);

  const result = await runPipeline(RANGE_QUESTION, deps);

  assert.equal(result.status, "answered");
  assert.equal(result.answer, GROUNDED_REPLY);
  assert.equal(result.needsSupplemental, false);
  assert.equal(deps.supplementalEmbedder.embedCalls, 0);
  assert.deepEqual(result.citations, [
    { sourceKind: "authoritative", docId: "F1", chunkId: "c1" },
    { sourceKind: "authoritative", docId: "F2", chunkId: "c1" },
  ]);
});

test("thin authoritative coverage adds supplemental passages after the facts", async () => {
  const generator = new ScriptedGenerator("The screen is responsive [authoritative:F1:c1].");
  const deps = await depsFor(SHORT_FACTS, generator, EXTERNAL);

  const result = await runPipeline("Is the screen responsive?", deps);

  assert.equal(result.status, "answered");
  assert.equal(result.needsSupplemental, true);
  assert.deepEqual(result.citations, [
    { sourceKind: "authoritative", docId: "F1", chunkId: "c1" },
    { sourceKind: "supplemental", docId: "E1", chunkId: "c1" },
    { sourceKind: "supplemental", docId: "E2", chunkId: "c1" },
  ]);

  const [prompt] = generator.prompts;
  assert.ok(prompt.includes("answering questions about Aurora X1."));
  assert.ok(prompt.includes("Source: authoritative | Doc: F1 | Chunk: c1\nScreen brightness"));
  assert.ok(prompt.includes("Source: supplemental | Doc: E1 | Chunk: c1\nOwners report"));
  assert.ok(prompt.indexOf("Doc: F1") < prompt.indexOf("Doc: E1"));
  assert.ok(prompt.endsWith("Question: Is the screen responsive?\n\nAnswer:"));
});

test("a sensitive question without facts is refused before generation", async () => {
  const generator = new ScriptedGenerator(GROUNDED_REPLY);
  const deps = await depsFor([], generator, EXTERNAL);

  const result = await runPipeline("What is the warranty on the screen?", deps);

  assert.equal(result.status, "refused_sensitive");
  assert.equal(result.answer, refusalMessage("sensitive"));
  assert.deepEqual(result.citations, []);
  assert.deepEqual(result.retrievedSupplemental, []);
  assert.equal(generator.prompts.length, 0);
  assert.equal(deps.supplementalEmbedder.embedCalls, 0);
});

test("a sensitive question with facts is answered from the facts only", async () => {
  const generator = new ScriptedGenerator("The facts describe the battery [authoritative:F1:c1].");
  const deps = await depsFor(SHORT_FACTS, generator, EXTERNAL);

  const result = await runPipeline("What is the price of the screen?", deps);

  assert.equal(result.status, "answered");
  assert.equal(result.isSensitive, true);
  assert.deepEqual(result.citations, [
    { sourceKind: "authoritative", docId: "F1", chunkId: "c1" },
  ]);
  assert.equal(deps.supplementalEmbedder.embedCalls, 0);
});

test("no passages at all yields insufficient_info", async () => {
  const generator = new ScriptedGenerator(GROUNDED_REPLY);
  const deps = await depsFor([], generator);

  const result = await runPipeline("Tell me about the seats", deps);

  assert.equal(result.status, "insufficient_info");
  assert.equal(result.answer, refusalMessage("insufficient_info"));
  assert.deepEqual(result.citations, []);
  assert.equal(generator.prompts.length, 0);
});

test("a generator failure yields error", async () => {
  const deps = await depsFor(FACTS, new ScriptedGenerator(new Error("model offline")));

  const result = await runPipeline(RANGE_QUESTION, deps);

  assert.equal(result.status, "error");
  assert.equal(result.answer, ERROR_MESSAGE);
  assert.deepEqual(result.citations, []);
});

test("an answer with an unsupported figure is withheld", async () => {
  const generator = new ScriptedGenerator("The battery lasts 3000 cycles.");
  const deps = await depsFor(FACTS, generator);

  const result = await runPipeline(RANGE_QUESTION, deps);

  assert.equal(result.status, "validation_failed");
  assert.equal(result.answer, refusalMessage("validation_failed"));
  assert.deepEqual(result.citations, []);
});

test("a retrieval failure yields error", async () => {
  const generator = new ScriptedGenerator(GROUNDED_REPLY);
  const deps = await depsFor(FACTS, generator);
  deps.authoritativeEmbedder.failEmbed = true;

  const result = await runPipeline(RANGE_QUESTION, deps);

  assert.equal(result.status, "error");
  assert.equal(result.answer, ERROR_MESSAGE);
  assert.equal(generator.prompts.length, 0);
});

test("ask reports not_ready until a build has been published", async () => {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });

  const manager = new IndexManager(
    {
      chunkSize: 800,
      chunkOverlap: 100,
      batchSize: 1,
      retryDelayMs: 10,
      cacheDirectory: tempDir("pipeline-"),
      authoritativeSourcePath: "unused-facts.md",
      supplementalSourcePath: "unused-external.json",
    },
    {
      embedder: new KeywordEmbedder(VOCABULARY),
      source: new MemorySource({ authoritative: FACTS }),
      sleep: () => gate,
    }
  );
  const pipeline = new RagPipeline(manager, new ScriptedGenerator(GROUNDED_REPLY), SETTINGS);

  assert.deepEqual(await pipeline.ask(RANGE_QUESTION), {
    answer: NOT_READY_MESSAGE,
    status: "not_ready",
    citations: [],
  });

  const building = pipeline.buildIndexes();
  assert.equal(pipeline.isReady(), false);
  assert.equal((await pipeline.ask(RANGE_QUESTION)).status, "not_ready");

  release();
  await building;

  assert.equal(pipeline.isReady(), true);
  const response = await pipeline.ask(RANGE_QUESTION);
  assert.equal(response.status, "answered");
  assert.equal(response.answer, GROUNDED_REPLY);
  assert.equal(response.citations.length, 2);
});
