import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { logConfigurationSummary } from './config/config.utils';
import type { PostlineConfiguration } from './config/config.types';
import { DEFAULT_HTTP_PORT, DEFAULT_ORIGIN } from './config/config.constants';
import { getErrorMessage, getErrorStack } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    configureApp(app);

    const config = app.get<ConfigService>(ConfigService);
    const httpPort = config.get<number>('postline.main.port', DEFAULT_HTTP_PORT);
    const environment = config.get<string>('postline.environment');

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown`);
      try {
        await app.close();
        logger.log('Application closed successfully');
        process.exit(0);
      } catch (shutdownError) {
        logger.error(`Error during shutdown: ${getErrorMessage(shutdownError)}`, getErrorStack(shutdownError));
        process.exit(1);
      }
    };

    const handleSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };

    process.on('SIGTERM', handleSignal);
    process.on('SIGINT', handleSignal);

    if (environment === 'development') {
      app.enableCors();
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      const postlineConfig = config.get<PostlineConfiguration>('postline');
      if (postlineConfig) {
        logConfigurationSummary(postlineConfig);
      }

      const swaggerConfig = new DocumentBuilder()
        .setTitle('Postline API')
        .setDescription('Accounts, threaded messages, live inbox events and server-to-server relay.')
        .setVersion('1.0')
        .addBearerAuth()
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    } else {
      const origin = config.get<string>('postline.main.origin', DEFAULT_ORIGIN);
      app.enableCors({ origin });
      logger.log(`Accepting requests from origin "${origin}"`);
    }

    // Triggers OnModuleInit: database migrations, session listener, keepalive sweep
    await app.init();
    await app.listen(httpPort);

    logger.log(`Postline is ready (HTTP port ${httpPort})`);
  } catch (error) {
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, getErrorStack(error));
    process.exit(1);
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
