import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import type { INestApplication } from "@nestjs/common";
import { DocumentBuilder, type SwaggerDocumentOptions, SwaggerModule } from "@nestjs/swagger";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { enabledLogLevels } from "@/common/types/logging";
import { AppModule } from "@/app.module";
import { configureApp } from "@/app.setup";
import { CALLER_HEADER } from "@/common/decorators/caller.decorator";
import { ConfigService } from "@/config/config.service";
import { ENV, ENV_HELPERS } from "@/config/environment.constants";

const logger = new FilteredLogger("Bootstrap", ENV.LOGGING.LOG_LEVEL);
let app: INestApplication | null = null;

async function bootstrap(): Promise<void> {
  try {
    app = await NestFactory.create(AppModule, {
      logger: enabledLogLevels(ENV.LOGGING.LOG_LEVEL),
      abortOnError: false,
    });

    validateConfiguration(app.get(ConfigService));

    app.enableCors({
      origin: process.env.CORS_ORIGIN || true,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Request-ID", CALLER_HEADER],
      exposedHeaders: ["X-Request-ID", "X-Response-Time"],
      credentials: false,
      maxAge: ENV.APPLICATION.CORS_MAX_AGE,
    });

    app.use(
      helmet({
        contentSecurityPolicy: {
          directives: {
            defaultSrc: ["'self'"],
            styleSrc: ["'self'", "'unsafe-inline'"],
            scriptSrc: ["'self'"],
            imgSrc: ["'self'", "data:", "https:"],
          },
        },
        crossOriginEmbedderPolicy: false,
      })
    );

    configureApp(app, { disableErrorMessages: ENV_HELPERS.isProduction() });

    const basePath = ENV.APPLICATION.BASE_PATH;
    setupSwaggerDocumentation(app, basePath);
    app.setGlobalPrefix(basePath);

    setupGracefulShutdown();

    const port = ENV.APPLICATION.PORT;
    await app.listen(port, "0.0.0.0");
    logger.log(`HTTP server is now listening on port ${port}`);
  } catch (error) {
    const errObj = error instanceof Error ? error : new Error(String(error));
    logger.error("Application startup failed:", errObj.stack, errObj.message);

    if (app) {
      await app.close().catch((closeError: unknown) => {
        logger.error("Application cleanup failed:", String(closeError));
      });
    }
    process.exit(1);
  }
}

function validateConfiguration(configService: ConfigService): void {
  const result = configService.validateConfiguration();
  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  if (!result.isValid) {
    throw new Error(`Invalid configuration: ${result.errors.join("; ")}`);
  }
  logger.log("Environment validation passed");
}

function setupSwaggerDocumentation(app: INestApplication, basePath: string): void {
  const config = new DocumentBuilder()
    .setTitle("Weighted Price Oracle API")
    .setDescription(
      "Aggregates prices submitted by authorized sources into a weighted average per asset, " +
        `with staleness-guarded reads and cross-asset conversion. Callers identify themselves with the ${CALLER_HEADER} header.`
    )
    .setVersion("1.0.0")
    .addTag("Oracle", "Price submission, aggregate reads and conversion")
    .addTag("Oracle Administration", "Owner-only source authorization and parameter management")
    .addTag("System Health", "Liveness check")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(app, config, options);
  SwaggerModule.setup(`${basePath}/api-doc`, app, document);
  logger.log("API documentation configured");
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.log(`Received ${signal} during shutdown, ignoring...`);
        return;
      }
      isShuttingDown = true;
      logger.log(`Received ${signal}, starting graceful shutdown...`);

      // Closing the app runs the OnModuleDestroy hooks
      const closing = app ? app.close() : Promise.resolve();
      void closing.then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Error during ${signal} shutdown:`, String(error));
          process.exit(1);
        }
      );
    });
  }
}

void bootstrap();
