import { Module } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";

// App controllers
import { AdminController } from "@/controllers/admin.controller";
import { HealthController } from "@/controllers/health.controller";
import { OracleController } from "@/controllers/oracle.controller";

// Core modules
import { ConfigModule } from "@/config/config.module";
import { OracleModule } from "@/oracle/oracle.module";

import { CallerIdentityGuard } from "@/common/guards/caller-identity.guard";
import { ResponseTimeInterceptor } from "@/common/interceptors/response-time.interceptor";

@Module({
  imports: [ConfigModule, OracleModule],
  controllers: [OracleController, AdminController, HealthController],
  providers: [
    CallerIdentityGuard,
    {
      provide: APP_INTERCEPTOR,
      useClass: ResponseTimeInterceptor,
    },
  ],
})
export class AppModule {}
