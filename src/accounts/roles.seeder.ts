import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Role } from './role.entity';
import { ROLE_DEFINITIONS } from './permissions';

export interface SeedSummary {
  created: string[];
  updated: string[];
}

/**
 * Creates or updates every role in ROLE_DEFINITIONS, replacing stored
 * permissions. Safe to run repeatedly.
 */
@Injectable()
export class RolesSeeder {
  private readonly logger = new Logger(RolesSeeder.name);

  constructor(
    @InjectRepository(Role)
    private readonly roleRepository: Repository<Role>,
  ) {}

  async seed(): Promise<SeedSummary> {
    const summary: SeedSummary = { created: [], updated: [] };

    for (const [name, permissions] of Object.entries(ROLE_DEFINITIONS)) {
      const existing = await this.roleRepository.findOne({ where: { name } });
      const role = existing ?? this.roleRepository.create({ name });
      role.permissions = [...permissions];
      await this.roleRepository.save(role);

      (existing ? summary.updated : summary.created).push(name);
      this.logger.log(
        `${existing ? 'Updated' : 'Created'} role ${name}: ${permissions.length} permissions`,
      );
    }

    return summary;
  }
}
