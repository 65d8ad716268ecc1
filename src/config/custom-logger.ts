import { Logger as TypeOrmLogger } from 'typeorm';
import { Logger } from '@nestjs/common';

const MAX_LOGGED_PARAMETERS_LENGTH = 2000;
const REDACTED_PARAMETERS = ['[parameters hidden]'];

/**
 * Statements touching chat history carry whole conversations as parameters;
 * those never reach the logs.
 */
export function isSensitiveQuery(query: string, parameters?: unknown[]): boolean {
  return (
    query.includes('chat_history') ||
    (parameters !== undefined && JSON.stringify(parameters).length > MAX_LOGGED_PARAMETERS_LENGTH)
  );
}

/**
 * Custom TypeORM logger that keeps conversation content out of query logs
 */
export class CustomDatabaseLogger implements TypeOrmLogger {
  private readonly logger = new Logger('Database');

  logQuery(query: string, parameters?: unknown[]) {
    this.logger.debug(`Query: ${query}`);
    if (parameters && parameters.length) {
      const shown = isSensitiveQuery(query, parameters) ? REDACTED_PARAMETERS : parameters;
      this.logger.debug(`Parameters: ${JSON.stringify(shown)}`);
    }
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[]) {
    this.logger.error(`Query failed: ${query}`);
    this.logger.error(`Error: ${error instanceof Error ? error.message : error}`);
    if (parameters && parameters.length) {
      const shown = isSensitiveQuery(query, parameters) ? REDACTED_PARAMETERS : parameters;
      this.logger.error(`Parameters: ${JSON.stringify(shown)}`);
    }
  }

  logQuerySlow(time: number, query: string, parameters?: unknown[]) {
    this.logger.warn(`Slow query detected (${time}ms): ${query}`);
    if (parameters && parameters.length) {
      const shown = isSensitiveQuery(query, parameters) ? REDACTED_PARAMETERS : parameters;
      this.logger.warn(`Parameters: ${JSON.stringify(shown)}`);
    }
  }

  logSchemaBuild(message: string) {
    this.logger.log(message);
  }

  logMigration(message: string) {
    this.logger.log(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown) {
    switch (level) {
      case 'log':
      case 'info':
        this.logger.log(message);
        break;
      case 'warn':
        this.logger.warn(message);
        break;
    }
  }
}
