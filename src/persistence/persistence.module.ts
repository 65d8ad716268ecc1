import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserProfile } from '../entities/user-profile.entity';
import { MoodLogEntry } from '../entities/mood-log.entity';
import { PersistenceStore } from './persistence-store';
import { TypeOrmPersistenceStore } from './typeorm-persistence.store';

@Module({
  imports: [TypeOrmModule.forFeature([UserProfile, MoodLogEntry])],
  providers: [
    {
      provide: PersistenceStore,
      useClass: TypeOrmPersistenceStore,
    },
  ],
  exports: [PersistenceStore],
})
export class PersistenceModule {}
