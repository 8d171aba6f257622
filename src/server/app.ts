import express, { Application, Request, Response } from "express";
import { RagPipeline } from "../modules/rag/rag.pipeline";
import { IndexBuildError, describeError } from "../modules/shared/errors";
import { IndexStatus } from "../modules/vector/index.manager";

export interface AppServices {
  pipeline: RagPipeline;
  getIndexStatus(): IndexStatus;
}

export function createApp(services: AppServices): Application {
  const { pipeline } = services;
  const app: Application = express();

  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      pipelineReady: true,
      vectorstoresReady: pipeline.isReady(),
    });
  });

  app.get("/status", (_req: Request, res: Response) => {
    res.json(services.getIndexStatus());
  });

  app.post("/ask", async (req: Request, res: Response) => {
    const question: unknown = req.body?.question;

    if (typeof question !== "string" || !question.trim()) {
      return res
        .status(400)
        .json({ error: "Field 'question' is required and must be a string." });
    }

    const result = await pipeline.ask(question);
    res.status(result.status === "not_ready" ? 503 : 200).json(result);
  });

  app.post("/embed", async (_req: Request, res: Response) => {
    console.log("EMBED ENDPOINT HIT");

    try {
      const startTime = Date.now();
      await pipeline.buildIndexes();
      res.json({
        status: "success",
        message: `Documents embedded successfully in ${Date.now() - startTime}ms`,
      });
    } catch (error) {
      console.error(`Error embedding documents: ${describeError(error)}`);

      let message = "Error embedding documents.";
      if (error instanceof IndexBuildError) {
        message = error.message;
      } else if (error instanceof Error) {
        const lower = error.message.toLowerCase();
        if (lower.includes("econnrefused") || lower.includes("connect")) {
          message = "Model provider is not running or not reachable.";
        }
      }

      res.status(500).json({ status: "error", message });
    }
  });

  return app;
}
