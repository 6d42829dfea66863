import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { ProductsService } from './products.service';
import { MainCategory } from './main-category.entity';
import { SubCategory } from './sub-category.entity';
import { Product } from './product.entity';
import { AccessPolicy } from '../accounts/access-policy.service';
import { User } from '../accounts/user.entity';
import { Role } from '../accounts/role.entity';
import { ROLE_DEFINITIONS } from '../accounts/permissions';

describe('ProductsService', () => {
  let service: ProductsService;

  const agentUser = Object.assign(new User(), {
    id: 3,
    isActive: true,
    isStaff: false,
    isSuperuser: false,
    userType: 'agent',
    roles: [
      Object.assign(new Role(), {
        name: 'Agent',
        permissions: [...ROLE_DEFINITIONS['Agent']],
      }),
    ],
    agent: { id: 8 },
  });

  const newcomer = Object.assign(new User(), {
    id: 4,
    isActive: true,
    isStaff: false,
    isSuperuser: false,
    userType: 'agent',
    roles: [],
    agent: null,
  });

  const mockMainCategoryRepository = { find: jest.fn(), findOne: jest.fn() };
  const mockSubCategoryRepository = {
    find: jest.fn(),
    findOne: jest.fn(),
    count: jest.fn(),
  };
  const mockProductRepository = {
    find: jest.fn(),
    findOne: jest.fn(),
    count: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProductsService,
        AccessPolicy,
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

    service = module.get<ProductsService>(ProductsService);
  });

  it('should attach active sub-category counts to main categories', async () => {
    mockMainCategoryRepository.find.mockResolvedValue([
      Object.assign(new MainCategory(), { id: 1, name: 'Insurance' }),
    ]);
    mockSubCategoryRepository.count.mockResolvedValue(6);

    const categories = await service.listMainCategories(agentUser);

    expect(categories).toHaveLength(1);
    expect(categories[0].subCategoriesCount).toBe(6);
    expect(mockSubCategoryRepository.count).toHaveBeenCalledWith({
      where: { mainCategoryId: 1, active: true },
    });
  });

  it('should filter sub-categories by main category slug', async () => {
    const main = Object.assign(new MainCategory(), {
      id: 1,
      name: 'Insurance',
    });
    mockSubCategoryRepository.find.mockResolvedValue([
      Object.assign(new SubCategory(), {
        id: 2,
        name: 'Life Insurance',
        mainCategory: main,
      }),
    ]);
    mockProductRepository.count.mockResolvedValue(3);

    const subs = await service.listSubCategories(agentUser, 'insurance');

    expect(subs[0].mainCategoryName).toBe('Insurance');
    expect(subs[0].productsCount).toBe(3);
    expect(mockSubCategoryRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({
        where: { active: true, mainCategory: { slug: 'insurance' } },
      }),
    );
  });

  it('should filter products by sub-category and main category ids', async () => {
    mockProductRepository.find.mockResolvedValue([]);

    await service.listProducts(agentUser, { subCategory: 2, mainCategory: 1 });

    expect(mockProductRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({
        where: {
          active: true,
          subCategoryId: 2,
          subCategory: { mainCategoryId: 1 },
        },
      }),
    );
  });

  it('should limit featured products to ten', async () => {
    mockProductRepository.find.mockResolvedValue([]);

    await service.featured(agentUser);

    expect(mockProductRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({ take: 10 }),
    );
  });

  it('should throw when a product slug is unknown', async () => {
    mockProductRepository.findOne.mockResolvedValue(null);

    await expect(service.findProduct(agentUser, 'missing')).rejects.toThrow(
      NotFoundException,
    );
  });

  it('should forbid browsing without product:view', async () => {
    await expect(service.listMainCategories(newcomer)).rejects.toThrow(
      ForbiddenException,
    );
    expect(mockMainCategoryRepository.find).not.toHaveBeenCalled();
  });
});
