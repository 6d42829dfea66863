import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { FormTemplate } from './form-template.entity';
import { FormsService } from './forms.service';
import { FormsSeeder } from './forms.seeder';
import { FormsController } from './forms.controller';
import { PublicFormsController } from './public-forms.controller';
import { Product } from '../products/product.entity';
import { AccountsModule } from '../accounts/accounts.module';
import { IdentifiersModule } from '../identifiers/identifiers.module';
import { ProductsModule } from '../products/products.module';
import { LeadsModule } from '../leads/leads.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([FormTemplate, Product]),
    AccountsModule,
    IdentifiersModule,
    ProductsModule,
    LeadsModule,
  ],
  controllers: [FormsController, PublicFormsController],
  providers: [FormsService, FormsSeeder],
  exports: [FormsSeeder],
})
export class FormsModule {}
