import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LeadsController } from './leads.controller';
import { LeadsService } from './leads.service';
import { Lead } from './lead.entity';
import { LeadActivity } from './lead-activity.entity';
import { AccountsModule } from '../accounts/accounts.module';
import { ClientsModule } from '../clients/clients.module';
import { IdentifiersModule } from '../identifiers/identifiers.module';
import { ProductsModule } from '../products/products.module';
import { DocumentsModule } from '../documents/documents.module';
import { leadMetricsProviders } from '../common/metrics.providers';

@Module({
  imports: [
    TypeOrmModule.forFeature([Lead, LeadActivity]),
    AccountsModule,
    ClientsModule,
    IdentifiersModule,
    ProductsModule,
    DocumentsModule,
  ],
  controllers: [LeadsController],
  providers: [LeadsService, ...leadMetricsProviders],
  exports: [LeadsService],
})
export class LeadsModule {}
