import { Test, type TestingModule } from "@nestjs/testing";
import type { DynamicModule, ForwardReference, INestApplication, Provider, Type } from "@nestjs/common";
import { AppModule } from "@/app.module";
import { configureApp } from "@/app.setup";
import { ManualHeightClock } from "@/oracle/clock/height-clock";
import { HEIGHT_CLOCK, ORACLE_CONFIG } from "@/oracle/oracle.constants";
import type { OracleConfig } from "@/oracle/types";
import { SilentLogger } from "./silent-logger";
import { TestDataBuilder } from "./test-data.builders";

type ModuleImport = Type<unknown> | DynamicModule | Promise<DynamicModule> | ForwardReference<unknown>;

/**
 * Test module builder utility to reduce boilerplate in test files
 */
export class TestModuleBuilder {
  private providers: Provider[] = [];
  private controllers: Type<unknown>[] = [];
  private imports: ModuleImport[] = [];
  private overrides: Array<{ token: string | Type<unknown>; value: unknown }> = [];

  addProvider(provider: Provider): TestModuleBuilder {
    this.providers.push(provider);
    return this;
  }

  addController(controller: Type<unknown>): TestModuleBuilder {
    this.controllers.push(controller);
    return this;
  }

  addImport(module: ModuleImport): TestModuleBuilder {
    this.imports.push(module);
    return this;
  }

  /**
   * Replace a provider anywhere in the imported module graph
   */
  override(token: string | Type<unknown>, value: unknown): TestModuleBuilder {
    this.overrides.push({ token, value });
    return this;
  }

  withHeightClock(clock: ManualHeightClock): TestModuleBuilder {
    return this.override(HEIGHT_CLOCK, clock);
  }

  withOracleConfig(config: OracleConfig): TestModuleBuilder {
    return this.override(ORACLE_CONFIG, config);
  }

  async build(): Promise<TestingModule> {
    let builder = Test.createTestingModule({
      imports: this.imports,
      controllers: this.controllers,
      providers: this.providers,
    });
    for (const { token, value } of this.overrides) {
      builder = builder.overrideProvider(token).useValue(value);
    }
    return builder.setLogger(new SilentLogger()).compile();
  }
}

export interface TestApp {
  app: INestApplication;
  clock: ManualHeightClock;
  config: OracleConfig;
}

/**
 * Full application over a manual clock, with the production request pipeline
 */
export async function createTestApp(overrides: Partial<OracleConfig> = {}, initialHeight = 0): Promise<TestApp> {
  const clock = new ManualHeightClock(initialHeight);
  const config = TestDataBuilder.createOracleConfig(overrides);

  const moduleRef = await new TestModuleBuilder()
    .addImport(AppModule)
    .withHeightClock(clock)
    .withOracleConfig(config)
    .build();

  const app = configureApp(moduleRef.createNestApplication());
  await app.init();

  return { app, clock, config };
}
