import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Agent } from '../accounts/agent.entity';
import { Lead } from '../leads/lead.entity';
import { IdentifierService } from './identifier.service';
import { identifierMetricsProviders } from '../common/metrics.providers';

@Module({
  imports: [TypeOrmModule.forFeature([Agent, Lead])],
  providers: [IdentifierService, ...identifierMetricsProviders],
  exports: [IdentifierService],
})
export class IdentifiersModule {}
