import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Unique,
} from 'typeorm';
import { MainCategory } from './main-category.entity';
import type { Product } from './product.entity';

@Entity('sub_categories')
@Unique(['mainCategoryId', 'slug'])
export class SubCategory {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  mainCategoryId!: number;

  @ManyToOne(() => MainCategory, (main) => main.subCategories, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'mainCategoryId' })
  mainCategory!: MainCategory;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 100 })
  slug!: string;

  @Column({ type: 'varchar', length: 50, default: '' })
  icon!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({ default: true })
  active!: boolean;

  @Column({ type: 'int', default: 0 })
  displayOrder!: number;

  /** Default form fields for products in this sub-category. */
  @Column({ type: 'simple-json', nullable: true })
  formTemplate!: Record<string, unknown> | null;

  @OneToMany('Product', (product: Product) => product.subCategory)
  products?: Product[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
