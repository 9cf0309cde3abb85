import { Logger } from '@nestjs/common';
import { InMemoryQueryLog } from './in-memory.query-log';

/** The parts of a `commandStarted` event the log reads. */
export interface StartedCommand {
  requestId: number;
  commandName: string;
  databaseName: string;
  command: Record<string, unknown>;
}

/** The parts of a `commandSucceeded` / `commandFailed` event the log reads. */
export interface FinishedCommand {
  requestId: number;
  /** Milliseconds. */
  duration: number;
}

/**
 * Anything emitting MongoDB command monitoring events; a MongoClient created
 * with `monitorCommands: true`.
 */
export interface CommandMonitor {
  on(event: 'commandStarted', listener: (event: StartedCommand) => void): unknown;
  on(event: 'commandSucceeded', listener: (event: FinishedCommand) => void): unknown;
  on(event: 'commandFailed', listener: (event: FinishedCommand) => void): unknown;
}

// Handshake, auth and session bookkeeping, not application queries.
const IGNORED_COMMANDS = new Set([
  'hello',
  'ismaster',
  'ping',
  'buildinfo',
  'saslstart',
  'saslcontinue',
  'endsessions',
  'killcursors',
]);

const DRIVER_FIELDS = new Set([
  'lsid',
  'txnNumber',
  '$clusterTime',
  '$db',
  '$readPreference',
  'apiVersion',
]);

/**
 * MongoQueryLog - records every application command a MongoClient runs,
 * with its duration, as a query.
 */
export class MongoQueryLog extends InMemoryQueryLog {
  private readonly logger = new Logger(MongoQueryLog.name);
  private readonly pending = new Map<number, string>();

  attach(monitor: CommandMonitor): this {
    monitor.on('commandStarted', (event) => this.started(event));
    monitor.on('commandSucceeded', (event) => this.finished(event));
    monitor.on('commandFailed', (event) => this.finished(event));
    return this;
  }

  private started(event: StartedCommand): void {
    if (IGNORED_COMMANDS.has(event.commandName.toLowerCase())) {
      return;
    }
    this.pending.set(event.requestId, this.statement(event));
  }

  private finished(event: FinishedCommand): void {
    const statement = this.pending.get(event.requestId);
    if (statement === undefined) {
      return;
    }
    this.pending.delete(event.requestId);
    this.record({ time: event.duration / 1000, statement });
  }

  private statement(event: StartedCommand): string {
    const command: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(event.command)) {
      if (!DRIVER_FIELDS.has(key)) {
        command[key] = value;
      }
    }
    try {
      return `${event.databaseName}.${event.commandName} ${JSON.stringify(command)}`;
    } catch (error) {
      this.logger.debug(`Could not serialise ${event.commandName} command: ${String(error)}`);
      return `${event.databaseName}.${event.commandName}`;
    }
  }
}
