import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MainCategory } from './main-category.entity';
import { SubCategory } from './sub-category.entity';
import { Product } from './product.entity';
import { ProductsService } from './products.service';
import { ProductsController } from './products.controller';
import { CatalogSeeder } from './catalog.seeder';
import { AccountsModule } from '../accounts/accounts.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([MainCategory, SubCategory, Product]),
    AccountsModule,
  ],
  controllers: [ProductsController],
  providers: [ProductsService, CatalogSeeder],
  exports: [ProductsService, CatalogSeeder],
})
export class ProductsModule {}
