import { Module, NestModule, MiddlewareConsumer } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";

import { AuthModule } from "./auth/auth.module";
import { CorrelationIdMiddleware } from "./common/middleware/correlation-id.middleware";
import { LoggingInterceptor } from "./common/interceptors/logging.interceptor";
import { SearchConfigModule } from "./config/search-config";
import { DatabaseModule } from "./database/database.module";
import { SearchModule } from "./search/search.module";

import { AppController } from "./app.controller";

@Module({
  imports: [SearchConfigModule, DatabaseModule, AuthModule, SearchModule],
  controllers: [AppController],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes("*");
  }
}
