import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Client } from './client.entity';
import { ClientResolver } from './client-resolver.service';
import { ClientsService } from './clients.service';
import { ClientsController } from './clients.controller';
import { AccountsModule } from '../accounts/accounts.module';
import { clientMetricsProviders } from '../common/metrics.providers';

@Module({
  imports: [TypeOrmModule.forFeature([Client]), AccountsModule],
  controllers: [ClientsController],
  providers: [ClientResolver, ClientsService, ...clientMetricsProviders],
  exports: [ClientResolver],
})
export class ClientsModule {}
