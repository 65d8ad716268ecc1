import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import * as fs from 'fs';

async function bootstrap() {
  // HTTPS configuration
  const httpsEnabled = process.env.HTTPS_ENABLED === 'true';
  const httpsOptions = httpsEnabled
    ? {
        key: fs.readFileSync(
          process.env.SSL_KEY_PATH || '/app/ssl/key.pem',
        ),
        cert: fs.readFileSync(
          process.env.SSL_CERT_PATH || '/app/ssl/cert.pem',
        ),
      }
    : undefined;

  const app = await NestFactory.create(AppModule, {
    httpsOptions,
  });

  // The web client is served from another origin
  app.enableCors({
    origin: true,
    credentials: true,
  });
  app.enableShutdownHooks();

  const port = process.env.PORT ?? (httpsEnabled ? 443 : 3000);
  await app.listen(port);

  new Logger('Bootstrap').log(`Application is running on: ${httpsEnabled ? 'https' : 'http'}://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
