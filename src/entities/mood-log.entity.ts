import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  ManyToOne,
  Index,
} from 'typeorm';
import { UserProfile } from './user-profile.entity';

@Entity('mood_logs')
@Index(['profile', 'recordedAt'])
export class MoodLogEntry {
  // Insertion order; breaks ties between equal timestamps
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @ManyToOne(() => UserProfile, (profile) => profile.moodLogs, { onDelete: 'CASCADE' })
  profile!: UserProfile;

  @Column({ type: 'varchar', length: 32 })
  mood!: string;

  @Column({ type: 'timestamptz' })
  recordedAt!: Date;
}
