import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { MainCategory } from './main-category.entity';
import { SubCategory } from './sub-category.entity';
import { Product, COMMISSION_TYPES } from './product.entity';
import { slugify } from '../common/slugify';

const ProductSeedSchema = z.object({
  name: z.string().min(1),
  slug: z.string().optional(),
  description: z.string().default(''),
  keyFeatures: z.array(z.string()).default([]),
  commissionRate: z.number().min(0),
  commissionType: z.enum(COMMISSION_TYPES).default('percentage'),
  customFields: z.record(z.unknown()).default({}),
});

const SubCategorySeedSchema = z.object({
  name: z.string().min(1),
  slug: z.string().optional(),
  icon: z.string().default(''),
  description: z.string().default(''),
  displayOrder: z.number().int().default(0),
  products: z.array(ProductSeedSchema).default([]),
});

const MainCategorySeedSchema = z.object({
  name: z.string().min(1),
  slug: z.string().optional(),
  icon: z.string().default(''),
  description: z.string().default(''),
  displayOrder: z.number().int().default(0),
  subCategories: z.array(SubCategorySeedSchema).default([]),
});

export const CatalogSeedSchema = z.object({
  mainCategories: z.array(MainCategorySeedSchema),
});

export type CatalogSeed = z.infer<typeof CatalogSeedSchema>;

export const DEFAULT_CATALOG_PATH = join(
  __dirname,
  '..',
  '..',
  'data',
  'catalog.json',
);

/**
 * Get-or-create of the catalog tree. Existing rows are matched by slug
 * and left untouched.
 */
@Injectable()
export class CatalogSeeder {
  private readonly logger = new Logger(CatalogSeeder.name);

  constructor(
    @InjectRepository(MainCategory)
    private readonly mainCategoryRepository: Repository<MainCategory>,
    @InjectRepository(SubCategory)
    private readonly subCategoryRepository: Repository<SubCategory>,
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
  ) {}

  async seedFromFile(path = DEFAULT_CATALOG_PATH): Promise<number> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
    return this.seed(CatalogSeedSchema.parse(raw));
  }

  /** Returns the number of rows created. */
  async seed(catalog: CatalogSeed): Promise<number> {
    let created = 0;

    for (const mainSeed of catalog.mainCategories) {
      const { subCategories, ...mainFields } = mainSeed;
      const slug = mainFields.slug ?? slugify(mainFields.name);
      let main = await this.mainCategoryRepository.findOne({ where: { slug } });
      if (!main) {
        main = await this.mainCategoryRepository.save(
          this.mainCategoryRepository.create({ ...mainFields, slug }),
        );
        created++;
        this.logger.log(`Created main category ${main.name}`);
      }

      for (const subSeed of subCategories) {
        const { products, ...subFields } = subSeed;
        const subSlug = subFields.slug ?? slugify(subFields.name);
        let sub = await this.subCategoryRepository.findOne({
          where: { mainCategoryId: main.id, slug: subSlug },
        });
        if (!sub) {
          sub = await this.subCategoryRepository.save(
            this.subCategoryRepository.create({
              ...subFields,
              slug: subSlug,
              mainCategoryId: main.id,
            }),
          );
          created++;
          this.logger.log(`Created sub-category ${sub.name}`);
        }

        for (const productSeed of products) {
          const productSlug = productSeed.slug ?? slugify(productSeed.name);
          const exists = await this.productRepository.exists({
            where: { subCategoryId: sub.id, slug: productSlug },
          });
          if (exists) {
            continue;
          }
          await this.productRepository.save(
            this.productRepository.create({
              ...productSeed,
              slug: productSlug,
              subCategoryId: sub.id,
            }),
          );
          created++;
          this.logger.log(`Created product ${productSeed.name}`);
        }
      }
    }

    return created;
  }
}
