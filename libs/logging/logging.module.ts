import { Module, Global, OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { LOGGING_CONFIG_KEY, LoggingSettings, loggingConfig } from "@config";
import { ContextStore, RequestInstrumentation } from "@logging/service";
import {
  InMemoryQueryLog,
  MongoConnectionClient,
  MongoQueryLog,
  WinstonLogger,
  createLoggingBackend,
} from "@logging/infrastructure";
import { QueryLogPort } from "@logging/out-ports";
import { QueryLogSource } from "@logging/value-objects";
import {
  QueryLogRegistry,
  RequestLogInterceptor,
} from "@logging/presentation";

/**
 * LoggingModule - NestJS module for the logging library.
 *
 * This module is marked as @Global() so it can be imported once in AppModule
 * and used throughout the application without re-importing. Register
 * RequestLogInterceptor as APP_INTERCEPTOR and install WinstonLogger with
 * `app.useLogger()` to enable request logging.
 */
@Global()
@Module({
  imports: [ConfigModule.forFeature(loggingConfig)],
  providers: [
    ContextStore,
    MongoConnectionClient,
    {
      provide: QueryLogPort,
      inject: [ConfigService, MongoConnectionClient],
      useFactory: (config: ConfigService, mongo: MongoConnectionClient) => {
        const settings =
          config.getOrThrow<LoggingSettings>(LOGGING_CONFIG_KEY);
        if (settings.queryLogSource === QueryLogSource.MONGODB) {
          return new MongoQueryLog(settings.queryLogCapacity).attach(
            mongo.client,
          );
        }
        return new InMemoryQueryLog(settings.queryLogCapacity);
      },
    },
    {
      provide: WinstonLogger,
      inject: [ConfigService, ContextStore],
      useFactory: (config: ConfigService, store: ContextStore) =>
        new WinstonLogger(
          createLoggingBackend(
            config.getOrThrow<LoggingSettings>(LOGGING_CONFIG_KEY),
            store,
          ),
          store,
        ),
    },
    RequestInstrumentation,
    RequestLogInterceptor,
  ],
  exports: [
    ContextStore,
    QueryLogPort,
    MongoConnectionClient,
    RequestInstrumentation,
    RequestLogInterceptor,
    WinstonLogger,
  ],
})
export class LoggingModule implements OnModuleInit, OnModuleDestroy {
  constructor(
    private readonly config: ConfigService,
    private readonly queryLog: QueryLogPort,
  ) {}

  onModuleInit() {
    const settings =
      this.config.getOrThrow<LoggingSettings>(LOGGING_CONFIG_KEY);
    if (settings.queryCountingEnabled) {
      QueryLogRegistry.register(this.queryLog);
    }
  }

  onModuleDestroy() {
    QueryLogRegistry.clear();
  }
}
