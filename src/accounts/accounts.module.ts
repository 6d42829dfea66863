import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './user.entity';
import { Role } from './role.entity';
import { Agent } from './agent.entity';
import { AccountsService } from './accounts.service';
import { AgentsService } from './agents.service';
import { AccessPolicy } from './access-policy.service';
import { RolesSeeder } from './roles.seeder';
import { UsersController } from './users.controller';
import { AgentsController } from './agents.controller';
import { IdentifiersModule } from '../identifiers/identifiers.module';
import { accountMetricsProviders } from '../common/metrics.providers';

@Module({
  imports: [TypeOrmModule.forFeature([User, Role, Agent]), IdentifiersModule],
  controllers: [UsersController, AgentsController],
  providers: [
    AccountsService,
    AgentsService,
    AccessPolicy,
    RolesSeeder,
    ...accountMetricsProviders,
  ],
  exports: [AccountsService, AccessPolicy, RolesSeeder],
})
export class AccountsModule {}
