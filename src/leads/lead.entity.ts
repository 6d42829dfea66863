import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { Product } from '../products/product.entity';
import { Agent } from '../accounts/agent.entity';
import { User } from '../accounts/user.entity';
import { Client } from '../clients/client.entity';
import { FormTemplate } from '../forms/form-template.entity';
import type { LeadActivity } from './lead-activity.entity';

export const LEAD_STATUSES = [
  'draft',
  'submitted',
  'in_progress',
  'approved',
  'rejected',
  'converted',
] as const;
export type LeadStatus = (typeof LEAD_STATUSES)[number];

/** Submission payload shaped by its form template; never typed further. */
export type FormPayload = Record<string, unknown>;

@Entity('leads')
@Index(['agentId', 'status'])
@Index(['status', 'createdAt'])
export class Lead {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50, unique: true, update: false })
  referenceNumber!: string;

  @Column()
  productId!: number;

  @ManyToOne(() => Product, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'productId' })
  product!: Product;

  @Column({ type: 'int', nullable: true })
  agentId!: number | null;

  @ManyToOne(() => Agent, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'agentId' })
  agent?: Agent | null;

  @Column()
  clientId!: number;

  @ManyToOne(() => Client, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'clientId' })
  client!: Client;

  @Column({ type: 'int', nullable: true })
  formTemplateId!: number | null;

  @ManyToOne(() => FormTemplate, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'formTemplateId' })
  formTemplate?: FormTemplate | null;

  // Point-in-time copy of the customer; the Client row may change later.
  @Column({ type: 'varchar', length: 200 })
  customerName!: string;

  @Column({ type: 'varchar', length: 254, default: '' })
  customerEmail!: string;

  @Column({ type: 'varchar', length: 20, default: '' })
  customerPhone!: string;

  @Column({ type: 'simple-json' })
  formData!: FormPayload;

  @Column({ type: 'varchar', length: 50, default: 'mobile_app' })
  source!: string;

  @Column({ type: 'varchar', length: 50, default: '' })
  referralCode!: string;

  @Column({ type: 'simple-enum', enum: LEAD_STATUSES, default: 'submitted' })
  status!: LeadStatus;

  @Column({ type: 'int', nullable: true })
  assignedToId!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'assignedToId' })
  assignedTo?: User | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  pdfPath!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  pdfUrl!: string | null;

  @OneToMany('LeadActivity', (activity: LeadActivity) => activity.lead)
  activities?: LeadActivity[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @Column({ type: Date, nullable: true })
  convertedAt!: Date | null;
}
