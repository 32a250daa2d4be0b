import { MongoJobStore, config, connectMongo, disconnectMongo, errorMeta, logger } from '@lotbatch/shared';
import { OpenAIBatchGateway, gatewayOptionsFromConfig } from './providers/openaiGateway';
import { BatchOrchestrator } from './orchestrator';
import { DeliveryDispatcher } from './dispatcher';
import { SchedulerLoop } from './scheduler';

async function main() {
  if (!config.openaiApiKey) throw new Error('OPENAI_API_KEY is not set');
  await connectMongo();
  const store = new MongoJobStore();
  const orchestrator = new BatchOrchestrator(store, new OpenAIBatchGateway(gatewayOptionsFromConfig(config.openaiApiKey)));
  const dispatcher = new DeliveryDispatcher(store);
  orchestrator.onCompleted(async (job) => {
    await dispatcher.enqueueForJob(job);
  });

  const scheduler = new SchedulerLoop(store, orchestrator, dispatcher);
  scheduler.start();

  const shutdown = (signal: string) => {
    logger.info('Worker shutting down', { signal });
    scheduler.stop();
    disconnectMongo()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Disconnect failed', errorMeta(err));
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  logger.info('Worker started', { cron: config.schedulerCron });
}

main().catch((err) => {
  logger.error('Worker fatal error', errorMeta(err));
  process.exit(1);
});
