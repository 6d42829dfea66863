import { Controller, Get, Param, Query } from '@nestjs/common';
import { ProductsService } from './products.service';
import { ProductQueryDto } from './dto/product-query.dto';
import { CurrentUser } from '../auth/current-user.decorator';
import { User } from '../accounts/user.entity';

@Controller()
export class ProductsController {
  constructor(private readonly productsService: ProductsService) {}

  @Get('main-categories')
  listMainCategories(@CurrentUser() user: User) {
    return this.productsService.listMainCategories(user);
  }

  @Get('main-categories/:slug')
  findMainCategory(@CurrentUser() user: User, @Param('slug') slug: string) {
    return this.productsService.findMainCategory(user, slug);
  }

  @Get('sub-categories')
  listSubCategories(
    @CurrentUser() user: User,
    @Query('mainCategorySlug') mainCategorySlug?: string,
  ) {
    return this.productsService.listSubCategories(user, mainCategorySlug);
  }

  @Get('sub-categories/:slug')
  findSubCategory(@CurrentUser() user: User, @Param('slug') slug: string) {
    return this.productsService.findSubCategory(user, slug);
  }

  @Get('products')
  listProducts(@CurrentUser() user: User, @Query() query: ProductQueryDto) {
    return this.productsService.listProducts(user, query);
  }

  // Declared before :slug so "featured" is not read as a slug.
  @Get('products/featured')
  featured(@CurrentUser() user: User) {
    return this.productsService.featured(user);
  }

  @Get('products/:slug')
  findProduct(@CurrentUser() user: User, @Param('slug') slug: string) {
    return this.productsService.findProduct(user, slug);
  }
}
