import { INestApplication, ValidationError, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { CandidateError } from './common/errors/candidate.error';
import { splitList } from './config/configuration';

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Flatten class-validator output into one entry per failed constraint
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parent?: string,
): FieldError[] {
  return errors.flatMap((error) => {
    const field = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({
      field,
      message,
    }));
    return [...own, ...flattenValidationErrors(error.children ?? [], field)];
  });
}

/**
 * Pipes, filters and HTTP settings shared by the server and the e2e tests
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      exceptionFactory: (errors: ValidationError[]) =>
        CandidateError.validation(
          'Request validation failed',
          flattenValidationErrors(errors),
        ),
    }),
  );

  app.useGlobalFilters(new AllExceptionsFilter());

  const origins = splitList(configService.get<string>('ALLOWED_ORIGINS'), ['*']);
  app.enableCors({ origin: origins.includes('*') ? true : origins });

  const prefix = configService.get<string>('API_PREFIX', '').trim();
  if (prefix) {
    app.setGlobalPrefix(prefix);
  }
}
