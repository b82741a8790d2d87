import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { UPLOAD_CONFIG, UploadConfig, resolveLogLevels } from './config/configuration';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();

  configureApp(app);

  const configService = app.get(ConfigService);
  const appName = configService.get<string>('APP_NAME', 'Resume Collector API');
  const appVersion = configService.get<string>('APP_VERSION', '1.0.0');
  const upload = app.get<UploadConfig>(UPLOAD_CONFIG);

  // Swagger documentation
  const config = new DocumentBuilder()
    .setTitle(appName)
    .setDescription('Upload, list, retrieve and delete candidate resumes')
    .setVersion(appVersion)
    .addTag('Health', 'Service status')
    .addTag('Candidates', 'Candidate resume management')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = Number(configService.get<string>('PORT', '3000'));
  await app.listen(port);

  const prefix = configService.get<string>('API_PREFIX', '').trim();
  const base = `http://localhost:${port}${prefix ? `/${prefix}` : ''}`;

  logger.log(`Starting ${appName} v${appVersion}`);
  logger.log(`Upload directory: ${upload.uploadDir}`);
  logger.log(`Max file size: ${(upload.maxFileSize / (1024 * 1024)).toFixed(2)} MB`);
  logger.log(`Allowed extensions: ${upload.allowedExtensions.join(', ')}`);
  logger.log(`Application is running on: ${base}`);
  logger.log(`Candidate endpoints: ${base}/candidates`);
  logger.log(`Swagger documentation: http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Application failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
