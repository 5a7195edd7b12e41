import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { OpenRouterModelInvoker } from './llm/client';
import { OptimizationPipeline } from './pipeline/optimize';
import { ContentResolver } from './pipeline/resolveContent';
import { JsonFileHistoryStore } from './store/optimizations';

dotenv.config();

const config = loadConfig();

if (!config.llm.apiKey) {
  console.warn('[LLM] OPENAI_API_KEY is not set; optimization requests will be rejected.');
}

const pipeline = new OptimizationPipeline({
  resolver: new ContentResolver({
    fetchTimeoutMs: config.fetch.timeoutMs,
    userAgent: config.fetch.userAgent,
  }),
  invoker: new OpenRouterModelInvoker(config.llm),
  store: new JsonFileHistoryStore(config.dataDir),
  promptLimits: config.prompt,
  retryBackoffMs: config.retry.backoffMs,
});

const app = createApp(pipeline, { maxUploadBytes: config.upload.maxBytes });

app.listen(config.port, () => {
  console.log(`Server listening on port ${config.port}`);
});

export default app;
