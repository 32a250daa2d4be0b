import { MongoJobStore, config, connectMongo, errorMeta, logger } from '@lotbatch/shared';
import { BatchOrchestrator, DeliveryMonitor, OpenAIBatchGateway, gatewayOptionsFromConfig } from '@lotbatch/worker';
import { createApp } from './server';

async function main() {
  if (!config.openaiApiKey) throw new Error('OPENAI_API_KEY is not set');
  await connectMongo();
  const store = new MongoJobStore();
  const orchestrator = new BatchOrchestrator(store, new OpenAIBatchGateway(gatewayOptionsFromConfig(config.openaiApiKey)));
  const monitor = new DeliveryMonitor(store);

  const app = createApp({ orchestrator, monitor, sharedKey: config.sharedKey });
  app.listen(config.port, () => {
    logger.info(`API listening on :${config.port}`);
  });
}

main().catch((err) => {
  logger.error('Fatal error', errorMeta(err));
  process.exit(1);
});
