import 'dotenv/config';
import { createRelayApp } from '@/app.js';
import { loadRelayConfig } from '@/config/index.js';
import { createLogger } from '@/observability/index.js';

async function start(): Promise<void> {
  const configResult = loadRelayConfig(process.env);
  if (!configResult.ok) {
    const logger = createLogger();
    logger.fatal('Invalid configuration', {
      component: 'main',
      error: configResult.error.message,
      issues: configResult.error.context?.['issues'],
    });
    process.exit(1);
  }

  const config = configResult.value;
  const logger = createLogger({ level: config.logLevel });
  const { port, host, webhookPath } = config.server;

  if (!config.whatsapp.accessToken || !config.whatsapp.phoneNumberId) {
    logger.warn('WhatsApp credentials not set; replies will fail until configured', {
      component: 'main',
    });
  }
  if (!config.whatsapp.verifyToken) {
    logger.warn('WHATSAPP_VERIFY_TOKEN not set; every verification request will be rejected', {
      component: 'main',
    });
  }

  try {
    const server = await createRelayApp(config, logger);

    // Graceful shutdown
    const shutdown = async (signal: string): Promise<void> => {
      logger.info('Shutting down...', { component: 'main', signal });
      try {
        await server.close();
      } catch (error: unknown) {
        logger.error('Error during shutdown', {
          component: 'main',
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, {
      component: 'main',
      webhookPath,
      replyPolicy: config.relay.replyPolicy,
      inboundSchema: config.relay.inboundSchema,
    });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
