import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Unique,
} from 'typeorm';
import { SubCategory } from './sub-category.entity';
import { decimalTransformer } from '../common/decimal.transformer';

export const COMMISSION_TYPES = ['percentage', 'flat'] as const;
export type CommissionType = (typeof COMMISSION_TYPES)[number];

@Entity('products')
@Unique(['subCategoryId', 'slug'])
export class Product {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  subCategoryId!: number;

  @ManyToOne(() => SubCategory, (sub) => sub.products, {
    onDelete: 'RESTRICT',
  })
  @JoinColumn({ name: 'subCategoryId' })
  subCategory!: SubCategory;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  @Column({ type: 'varchar', length: 200 })
  slug!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'simple-json', nullable: true })
  keyFeatures!: string[] | null;

  @Column({
    type: 'decimal',
    precision: 5,
    scale: 2,
    transformer: decimalTransformer,
  })
  commissionRate!: number;

  @Column({
    type: 'simple-enum',
    enum: COMMISSION_TYPES,
    default: 'percentage',
  })
  commissionType!: CommissionType;

  /** Provider details and terms, e.g. `{ "provider": "..." }`. */
  @Column({ type: 'simple-json', nullable: true })
  customFields!: Record<string, unknown> | null;

  @Column({ type: 'simple-json', nullable: true })
  customFormFields!: Record<string, unknown> | null;

  @Column({ default: true })
  active!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
