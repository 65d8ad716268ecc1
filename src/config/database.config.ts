import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { CustomDatabaseLogger } from './custom-logger';
import { UserProfile } from '../entities/user-profile.entity';
import { MoodLogEntry } from '../entities/mood-log.entity';

export const getDatabaseConfig = (
  configService: ConfigService,
): TypeOrmModuleOptions => ({
  type: 'postgres',
  host: configService.get<string>('DATABASE_HOST', 'localhost'),
  port: parseInt(configService.get<string>('DATABASE_PORT', '5432'), 10),
  username: configService.get<string>('DATABASE_USER'),
  password: configService.get<string>('DATABASE_PASSWORD'),
  database: configService.get<string>('DATABASE_NAME', 'serenity'),
  entities: [UserProfile, MoodLogEntry],
  synchronize: configService.get<string>('DATABASE_SYNCHRONIZE', 'false') === 'true',
  logging: ['error', 'warn', 'query'],
  logger: new CustomDatabaseLogger(), // Keeps conversation payloads out of query logs
  maxQueryExecutionTime: 1000, // Log queries slower than 1 second

  // Connection pooling
  extra: {
    max: 20, // Maximum number of clients in the pool
    min: 2,  // Minimum number of clients in the pool
    idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
    connectionTimeoutMillis: 5000, // Timeout after 5 seconds if no connection available
  },
});
