import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { MoodService } from './mood.service';
import { MoodController } from './mood.controller';

@Module({
  imports: [PersistenceModule],
  providers: [MoodService],
  controllers: [MoodController],
})
export class MoodModule {}
