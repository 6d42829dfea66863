import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { Client } from './client.entity';
import { Lead } from '../leads/lead.entity';
import { AccessPolicy, Actor } from '../accounts/access-policy.service';
import { Page, pageOf, PAGE_SIZE, skipFor } from '../common/pagination';

@Injectable()
export class ClientsService {
  constructor(
    @InjectRepository(Client)
    private readonly clientRepository: Repository<Client>,
    private readonly accessPolicy: AccessPolicy,
  ) {}

  async list(actor: Actor, page = 1, search?: string): Promise<Page<Client>> {
    this.accessPolicy.assert(actor, 'client:view');

    const query = this.scopedQuery(actor)
      .orderBy('client.id', 'DESC')
      .skip(skipFor(page))
      .take(PAGE_SIZE);

    if (search) {
      query.andWhere(
        '(client.name LIKE :search OR client.phone LIKE :search OR client.email LIKE :search)',
        { search: `%${search}%` },
      );
    }

    const [results, count] = await query.getManyAndCount();
    return pageOf(results, count, page);
  }

  async findOne(actor: Actor, id: number): Promise<Client> {
    this.accessPolicy.assert(actor, 'client:view');

    const client = await this.scopedQuery(actor)
      .andWhere('client.id = :id', { id })
      .getOne();
    if (!client) {
      throw new NotFoundException(`Client ${id} not found`);
    }
    return client;
  }

  /** Agents only reach clients behind their own leads. */
  private scopedQuery(actor: Actor): SelectQueryBuilder<Client> {
    const query = this.clientRepository.createQueryBuilder('client');
    const agentId = this.accessPolicy.scopeFor(actor);
    if (agentId === null) {
      return query.where('1 = 1');
    }
    return query.where(
      (qb) =>
        `EXISTS ${qb
          .subQuery()
          .select('1')
          .from(Lead, 'lead')
          .where('lead.clientId = client.id')
          .andWhere('lead.agentId = :agentId')
          .getQuery()}`,
      { agentId: agentId ?? -1 },
    );
  }
}
