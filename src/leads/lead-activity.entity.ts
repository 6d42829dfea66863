import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Lead } from './lead.entity';
import { User } from '../accounts/user.entity';

export const ACTIVITY_TYPES = [
  'created',
  'status_change',
  'note_added',
  'document_uploaded',
  'assigned',
  'contacted',
] as const;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];

/** Append-only timeline entry; rows are inserted, never updated. */
@Entity('lead_activities')
@Index(['leadId', 'createdAt'])
export class LeadActivity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  leadId!: number;

  @ManyToOne(() => Lead, (lead) => lead.activities, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'leadId' })
  lead!: Lead;

  @Column({ type: 'int', nullable: true })
  userId!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'userId' })
  user?: User | null;

  @Column({ type: 'simple-enum', enum: ACTIVITY_TYPES })
  activityType!: ActivityType;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'simple-json' })
  metadata!: Record<string, unknown>;

  @CreateDateColumn()
  createdAt!: Date;
}
