import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { MainCategory } from './main-category.entity';
import { SubCategory } from './sub-category.entity';
import { Product } from './product.entity';
import { AccessPolicy, Actor } from '../accounts/access-policy.service';
import { ProductQueryDto } from './dto/product-query.dto';

const FEATURED_LIMIT = 10;

export type MainCategoryView = MainCategory & { subCategoriesCount: number };
export type SubCategoryView = SubCategory & {
  mainCategoryName: string;
  productsCount: number;
};

/** Read-only catalog; admins manage it through the seed data. */
@Injectable()
export class ProductsService {
  constructor(
    @InjectRepository(MainCategory)
    private readonly mainCategoryRepository: Repository<MainCategory>,
    @InjectRepository(SubCategory)
    private readonly subCategoryRepository: Repository<SubCategory>,
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
    private readonly accessPolicy: AccessPolicy,
  ) {}

  async listMainCategories(actor: Actor): Promise<MainCategoryView[]> {
    this.accessPolicy.assert(actor, 'product:view');

    const categories = await this.mainCategoryRepository.find({
      where: { active: true },
      order: { displayOrder: 'ASC', name: 'ASC' },
    });
    return Promise.all(
      categories.map(async (category) =>
        Object.assign(category, {
          subCategoriesCount: await this.subCategoryRepository.count({
            where: { mainCategoryId: category.id, active: true },
          }),
        }),
      ),
    );
  }

  async findMainCategory(actor: Actor, slug: string): Promise<MainCategoryView> {
    this.accessPolicy.assert(actor, 'product:view');

    const category = await this.mainCategoryRepository.findOne({
      where: { slug, active: true },
    });
    if (!category) {
      throw new NotFoundException(`Main category '${slug}' not found`);
    }
    return Object.assign(category, {
      subCategoriesCount: await this.subCategoryRepository.count({
        where: { mainCategoryId: category.id, active: true },
      }),
    });
  }

  async listSubCategories(
    actor: Actor,
    mainCategorySlug?: string,
  ): Promise<SubCategoryView[]> {
    this.accessPolicy.assert(actor, 'product:view');

    const where: FindOptionsWhere<SubCategory> = { active: true };
    if (mainCategorySlug) {
      where.mainCategory = { slug: mainCategorySlug };
    }
    const subCategories = await this.subCategoryRepository.find({
      where,
      relations: { mainCategory: true },
      order: { mainCategoryId: 'ASC', displayOrder: 'ASC', name: 'ASC' },
    });
    return Promise.all(subCategories.map((sub) => this.withProductCount(sub)));
  }

  async findSubCategory(actor: Actor, slug: string): Promise<SubCategoryView> {
    this.accessPolicy.assert(actor, 'product:view');

    const subCategory = await this.subCategoryRepository.findOne({
      where: { slug, active: true },
      relations: { mainCategory: true },
    });
    if (!subCategory) {
      throw new NotFoundException(`Sub-category '${slug}' not found`);
    }
    return this.withProductCount(subCategory);
  }

  async listProducts(actor: Actor, query: ProductQueryDto): Promise<Product[]> {
    this.accessPolicy.assert(actor, 'product:view');

    const where: FindOptionsWhere<Product> = { active: true };
    if (query.subCategory !== undefined) {
      where.subCategoryId = query.subCategory;
    }
    if (query.mainCategory !== undefined) {
      where.subCategory = { mainCategoryId: query.mainCategory };
    }
    return this.productRepository.find({
      where,
      relations: { subCategory: { mainCategory: true } },
      order: { subCategoryId: 'ASC', name: 'ASC' },
    });
  }

  async featured(actor: Actor): Promise<Product[]> {
    this.accessPolicy.assert(actor, 'product:view');

    return this.productRepository.find({
      where: { active: true },
      relations: { subCategory: { mainCategory: true } },
      order: { subCategoryId: 'ASC', name: 'ASC' },
      take: FEATURED_LIMIT,
    });
  }

  async findProduct(actor: Actor, slug: string): Promise<Product> {
    this.accessPolicy.assert(actor, 'product:view');

    const product = await this.productRepository.findOne({
      where: { slug, active: true },
      relations: { subCategory: { mainCategory: true } },
    });
    if (!product) {
      throw new NotFoundException(`Product '${slug}' not found`);
    }
    return product;
  }

  /** Active product with its sub-category, as lead creation needs it. */
  async findActiveById(id: number): Promise<Product | null> {
    return this.productRepository.findOne({
      where: { id, active: true },
      relations: { subCategory: true },
    });
  }

  private async withProductCount(sub: SubCategory): Promise<SubCategoryView> {
    return Object.assign(sub, {
      mainCategoryName: sub.mainCategory.name,
      productsCount: await this.productRepository.count({
        where: { subCategoryId: sub.id, active: true },
      }),
    });
  }
}
