import {
  Injectable,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { MongoClient, Db } from "mongodb";
import { LOGGING_CONFIG_KEY, LoggingSettings } from "@config";
import { QueryLogSource } from "@logging/value-objects";

/**
 * MongoConnectionClient - the application's MongoDB connection, opened with
 * command monitoring so every command it runs reaches the query log.
 *
 * Connects only when MongoDB is the configured query source.
 */
@Injectable()
export class MongoConnectionClient implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MongoConnectionClient.name);
  readonly client: MongoClient;
  private readonly enabled: boolean;
  private db?: Db;

  constructor(configService: ConfigService) {
    const settings =
      configService.getOrThrow<LoggingSettings>(LOGGING_CONFIG_KEY);
    this.enabled = settings.queryLogSource === QueryLogSource.MONGODB;
    this.client = new MongoClient(settings.mongoUri, { monitorCommands: true });
  }

  async onModuleInit() {
    if (!this.enabled) {
      return;
    }
    try {
      await this.client.connect();
      this.db = this.client.db();
      this.logger.log(`Successfully connected to MongoDB: ${this.db.databaseName}`);
    } catch (error) {
      this.logger.error(
        `Failed to connect to MongoDB: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  async onModuleDestroy() {
    if (this.db) {
      await this.client.close();
      this.logger.log("MongoDB connection closed.");
    }
  }
}
