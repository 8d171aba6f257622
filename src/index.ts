import dotenv from "dotenv";
import { loadConfig } from "./config/app.config";
import { createModelProvider } from "./modules/llm/provider.factory";
import { RagPipeline } from "./modules/rag/rag.pipeline";
import { IndexManager } from "./modules/vector/index.manager";
import { createApp } from "./server/app";

dotenv.config();

const config = loadConfig();
const provider = createModelProvider(config);
const indexManager = new IndexManager(config, { embedder: provider });
const pipeline = new RagPipeline(indexManager, provider, config);

const app = createApp({
  pipeline,
  getIndexStatus: () => indexManager.getStatus(),
});

app.listen(config.port, () => {
  console.log(`Backend server is running on http://localhost:${config.port}`);
  console.log("Vector indexes are not built yet; POST /embed to build or restore them.");
});
