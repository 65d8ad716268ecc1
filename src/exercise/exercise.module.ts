import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { ExerciseService } from './exercise.service';
import { ExerciseController } from './exercise.controller';

@Module({
  imports: [PersistenceModule],
  providers: [ExerciseService],
  controllers: [ExerciseController],
  exports: [ExerciseService],
})
export class ExerciseModule {}
