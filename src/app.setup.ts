import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { ErrorResponseBuilder } from "@/common/errors/error-response.builder";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";

export interface AppSetupOptions {
  /** Hide class-validator constraint messages from clients */
  disableErrorMessages?: boolean;
}

/**
 * Request pipeline shared by the server and the end-to-end tests
 */
export function configureApp(app: INestApplication, options: AppSetupOptions = {}): INestApplication {
  const hideViolations = options.disableErrorMessages ?? false;

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: errors =>
        ErrorResponseBuilder.createValidationError(
          "Request validation failed",
          undefined,
          hideViolations ? undefined : { violations: errors.flatMap(error => Object.values(error.constraints ?? {})) }
        ),
    })
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  return app;
}
