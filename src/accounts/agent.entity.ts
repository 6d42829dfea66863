import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  OneToOne,
  JoinColumn,
} from 'typeorm';
import { User } from './user.entity';
import { decimalTransformer } from '../common/decimal.transformer';

export const AGENT_STATUSES = ['active', 'inactive', 'suspended'] as const;
export type AgentStatus = (typeof AGENT_STATUSES)[number];

/**
 * Agent profile of a promoted user. The code is written once on insert
 * (`update: false`) and never changes afterwards.
 */
@Entity('agents')
export class Agent {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  userId!: number;

  @OneToOne(() => User, (user) => user.agent, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @Column({ type: 'varchar', length: 20, unique: true, update: false })
  agentCode!: string;

  @Column({ type: 'varchar', length: 200 })
  referralLink!: string;

  @Column({
    type: 'decimal',
    precision: 5,
    scale: 2,
    default: 5.0,
    transformer: decimalTransformer,
  })
  commissionRate!: number;

  @Column({ type: 'simple-enum', enum: AGENT_STATUSES, default: 'active' })
  status!: AgentStatus;

  @Column({ default: false })
  kycVerified!: boolean;

  @Column({ type: 'simple-json', nullable: true })
  kycDocuments!: Record<string, unknown> | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
