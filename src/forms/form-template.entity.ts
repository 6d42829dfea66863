import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Product } from '../products/product.entity';

/**
 * Externally configured form. `schema` stays opaque here; only the
 * required-field check in form-schema.ts looks inside it.
 */
@Entity('form_templates')
@Index(['productId', 'isActive'])
export class FormTemplate {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ type: 'int', nullable: true })
  productId!: number | null;

  @ManyToOne(() => Product, { nullable: true, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'productId' })
  product?: Product | null;

  @Column({ type: 'simple-json' })
  schema!: Record<string, unknown>;

  @Column({ default: false })
  isShareable!: boolean;

  @Column({ type: 'varchar', length: 32, unique: true, nullable: true })
  shareToken!: string | null;

  @Column({ type: Date, nullable: true })
  shareExpiry!: Date | null;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  get shareUrl(): string | null {
    return this.isShareable && this.shareToken
      ? `/public/forms/${this.shareToken}`
      : null;
  }
}
