import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CatalogSeeder, CatalogSeedSchema } from './catalog.seeder';
import { MainCategory } from './main-category.entity';
import { SubCategory } from './sub-category.entity';
import { Product } from './product.entity';

describe('CatalogSeeder', () => {
  let seeder: CatalogSeeder;

  const mockMainCategoryRepository = {
    findOne: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
  };
  const mockSubCategoryRepository = {
    findOne: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
  };
  const mockProductRepository = {
    exists: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
  };

  const catalog = CatalogSeedSchema.parse({
    mainCategories: [
      {
        name: 'Insurance',
        subCategories: [
          {
            name: 'Life Insurance',
            products: [
              { name: 'Term Life Plan', commissionRate: 20 },
              { name: 'Savings Plan', slug: 'savings', commissionRate: 10 },
            ],
          },
        ],
      },
    ],
  });

  beforeEach(async () => {
    jest.clearAllMocks();

    mockMainCategoryRepository.create.mockImplementation(
      (fields: Partial<MainCategory>) => Object.assign(new MainCategory(), fields),
    );
    mockMainCategoryRepository.save.mockImplementation(
      async (row: MainCategory) => Object.assign(row, { id: 1 }),
    );
    mockSubCategoryRepository.create.mockImplementation(
      (fields: Partial<SubCategory>) => Object.assign(new SubCategory(), fields),
    );
    mockSubCategoryRepository.save.mockImplementation(
      async (row: SubCategory) => Object.assign(row, { id: 2 }),
    );
    mockProductRepository.create.mockImplementation(
      (fields: Partial<Product>) => Object.assign(new Product(), fields),
    );
    mockProductRepository.save.mockImplementation(async (row: Product) => row);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CatalogSeeder,
        {
          provide: getRepositoryToken(MainCategory),
          useValue: mockMainCategoryRepository,
        },
        {
          provide: getRepositoryToken(SubCategory),
          useValue: mockSubCategoryRepository,
        },
        {
          provide: getRepositoryToken(Product),
          useValue: mockProductRepository,
        },
      ],
    }).compile();

    seeder = module.get<CatalogSeeder>(CatalogSeeder);
  });

  it('should create the whole tree with slugs derived from names', async () => {
    mockMainCategoryRepository.findOne.mockResolvedValue(null);
    mockSubCategoryRepository.findOne.mockResolvedValue(null);
    mockProductRepository.exists.mockResolvedValue(false);

    const created = await seeder.seed(catalog);

    expect(created).toBe(4);
    expect(mockMainCategoryRepository.create).toHaveBeenCalledWith(
      expect.objectContaining({ name: 'Insurance', slug: 'insurance' }),
    );
    expect(mockSubCategoryRepository.create).toHaveBeenCalledWith(
      expect.objectContaining({ slug: 'life-insurance', mainCategoryId: 1 }),
    );
    expect(mockProductRepository.create).toHaveBeenCalledWith(
      expect.objectContaining({
        slug: 'term-life-plan',
        subCategoryId: 2,
        commissionType: 'percentage',
      }),
    );
    expect(mockProductRepository.create).toHaveBeenCalledWith(
      expect.objectContaining({ slug: 'savings' }),
    );
  });

  it('should leave existing rows untouched', async () => {
    mockMainCategoryRepository.findOne.mockResolvedValue(
      Object.assign(new MainCategory(), { id: 1, name: 'Insurance' }),
    );
    mockSubCategoryRepository.findOne.mockResolvedValue(
      Object.assign(new SubCategory(), { id: 2, name: 'Life Insurance' }),
    );
    mockProductRepository.exists.mockResolvedValue(true);

    const created = await seeder.seed(catalog);

    expect(created).toBe(0);
    expect(mockMainCategoryRepository.save).not.toHaveBeenCalled();
    expect(mockSubCategoryRepository.save).not.toHaveBeenCalled();
    expect(mockProductRepository.save).not.toHaveBeenCalled();
  });

  it('should load the bundled catalog file', async () => {
    mockMainCategoryRepository.findOne.mockResolvedValue(null);
    mockSubCategoryRepository.findOne.mockResolvedValue(null);
    mockProductRepository.exists.mockResolvedValue(false);

    const created = await seeder.seedFromFile();

    // 1 main category, 6 sub-categories, 6 products
    expect(created).toBe(13);
  });
});
