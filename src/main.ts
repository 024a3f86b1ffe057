import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { validateEnv } from './common/config/env.validation';
import { createLogger } from './common/utils/logger';

async function bootstrap(): Promise<void> {
  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    bodyParser: false,
    logger: [nestLogLevel, 'warn', 'error'],
  });

  configureApp(app, validatedEnv);
  app.enableShutdownHooks();

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Order status assistant listening on port ${validatedEnv.PORT}`, {
    event: 'service_started',
    port: validatedEnv.PORT,
    node_env: validatedEnv.NODE_ENV,
  });
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap order status assistant',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
