import 'dotenv/config';
import { LlmCategorizer } from './categorization/llmCategorizer';
import { loadConfig } from './config/config';
import { createApp } from './http/app';
import { createLogger } from './obs/logger';
import { createFsExportStore } from './persistence/fsStore';
import { ScraperBuilder } from './scraper/builder';
import { LLMService } from './services/llmService';

const config = loadConfig();
const logger = createLogger(config);
const llmReady = config.llm.enabled && Boolean(config.llm.apiKey);

logger.info('Config loaded', {
  environment: config.environment,
  labelStyle: config.scraping.labelStyle,
  delayRangeMs: [config.scraping.delayMinMs, config.scraping.delayMaxMs],
  llm: {
    enabled: llmReady,
    model: config.llm.model,
    enhance: config.llm.enhance,
  },
  exportRoot: config.export.rootDir,
});

let builder = ScraperBuilder.create(config.scraping)
  .withLogger(logger.child({ component: 'scraper' }))
  .withExportStore(createFsExportStore(config));

if (llmReady) {
  const llmLogger = logger.child({ component: 'llm' });
  const categorizer = new LlmCategorizer({ generator: new LLMService(config.llm, llmLogger), logger: llmLogger });
  builder = builder.withCategorizer(categorizer);
  if (config.llm.enhance) {
    builder = builder.withEnhancer(categorizer);
  }
}

const app = createApp({ config, orchestrator: builder.build(), logger });
const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
