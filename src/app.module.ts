import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { PromptsModule } from './prompts/prompts.module';
import { ChatModule } from './chat/chat.module';
import { ExerciseModule } from './exercise/exercise.module';
import { MoodModule } from './mood/mood.module';
import { UsersModule } from './users/users.module';
import { getDatabaseConfig } from './config/database.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: getDatabaseConfig,
      inject: [ConfigService],
    }),
    ScheduleModule.forRoot(),
    PromptsModule,
    ChatModule,
    ExerciseModule,
    MoodModule,
    UsersModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
