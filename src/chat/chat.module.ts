import { Module } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { ChatGateway } from './chat.gateway';
import { MoodClassifier } from './mood-classifier.service';
import { ResponseGenerator } from './response-generator.service';
import { DialogueOrchestrator } from './dialogue-orchestrator.service';
import { CrisisAffordanceService } from './crisis-affordance.service';
import { CopingSuggestionService } from './coping-suggestion.service';
import { InferenceModule } from '../inference/inference.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { ActivityModule } from '../activity/activity.module';
import { ExerciseModule } from '../exercise/exercise.module';

@Module({
  imports: [
    InferenceModule,
    PersistenceModule,
    ActivityModule,
    ExerciseModule,
    CacheModule.register({
      ttl: 120000, // Default 2 minutes TTL in milliseconds
      max: 500, // Maximum number of cached histories
    }),
  ],
  providers: [
    ChatService,
    ChatGateway,
    MoodClassifier,
    ResponseGenerator,
    DialogueOrchestrator,
    CrisisAffordanceService,
    CopingSuggestionService,
  ],
  controllers: [ChatController],
  exports: [DialogueOrchestrator, MoodClassifier, ResponseGenerator],
})
export class ChatModule {}
