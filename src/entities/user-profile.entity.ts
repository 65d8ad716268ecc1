import {
  Entity,
  Column,
  PrimaryColumn,
  CreateDateColumn,
  OneToMany,
} from 'typeorm';
import { ChatMessage } from '../chat/message.types';
import { MoodLogEntry } from './mood-log.entity';

/**
 * One row per chat session. The primary key is the session identifier the
 * client supplies; it is never generated here.
 */
@Entity('user_profiles')
export class UserProfile {
  @PrimaryColumn({ type: 'varchar', length: 128 })
  id!: string;

  @Column({ default: 'Serenity User' })
  name!: string;

  @Column()
  email!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  lastActive!: Date | null;

  @Column({ type: 'int', default: 0 })
  daysActive!: number;

  @Column({ type: 'int', default: 0 })
  sessionsCompleted!: number;

  @Column({ type: 'int', default: 0 })
  progressScore!: number;

  @Column({ name: 'chat_history', type: 'jsonb', default: () => "'[]'" })
  chatHistory!: ChatMessage[];

  @OneToMany(() => MoodLogEntry, (moodLog) => moodLog.profile)
  moodLogs!: MoodLogEntry[];
}
