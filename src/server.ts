import { loadConfig } from './config';
import { createApp } from './http/app';
import { createServices } from './services/container';
import { createLogger } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('job-analyzer', config.logLevel);
  const services = createServices(config, logger);
  const app = createApp(services);

  const server = app.listen(config.port, () => {
    logger.info(`Job Market Analyzer API listening on port ${config.port}`, {
      modelsDir: config.modelsDir,
      salaryModel: services.models.salaryPredictor !== null,
      jobClassifier: services.models.jobClassifier !== null,
    });
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      services.close().then(
        () => process.exit(0),
        (error) => {
          logger.error('Error closing database pool', error);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  createLogger('job-analyzer').error('Failed to start server', error);
  process.exit(1);
});
