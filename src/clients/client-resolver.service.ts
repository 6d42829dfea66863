import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { EntityManager, Repository } from 'typeorm';
import { Client } from './client.entity';
import { CLIENTS_RESOLVED_TOTAL } from '../common/metrics.providers';
import { redactContact } from '../common/contact-redactor';

export interface ContactDetails {
  phone?: string | null;
  email?: string | null;
  name: string;
}

export type ResolutionOutcome = 'matched_phone' | 'matched_email' | 'created';

export interface ClientResolution {
  client: Client;
  outcome: ResolutionOutcome;
}

/**
 * Maps a submission's contact details to one Client: exact phone match,
 * then exact email match, else a new row. Values are compared as given.
 * Without a unique index on phone, two concurrent submissions for an unseen
 * phone both create a Client.
 */
@Injectable()
export class ClientResolver {
  private readonly logger = new Logger(ClientResolver.name);

  constructor(
    @InjectRepository(Client)
    private readonly clientRepository: Repository<Client>,
    @InjectMetric(CLIENTS_RESOLVED_TOTAL)
    private readonly resolvedCounter: Counter<string>,
  ) {}

  async resolve(
    contact: ContactDetails,
    manager?: EntityManager,
  ): Promise<Client> {
    const { client } = await this.resolveWithOutcome(contact, manager);
    return client;
  }

  async resolveWithOutcome(
    contact: ContactDetails,
    manager?: EntityManager,
  ): Promise<ClientResolution> {
    const clients = manager
      ? manager.getRepository(Client)
      : this.clientRepository;
    const phone = contact.phone ?? '';
    const email = contact.email ?? '';

    if (phone) {
      const byPhone = await clients.findOne({
        where: { phone },
        order: { id: 'ASC' },
      });
      if (byPhone) {
        return this.record(byPhone, 'matched_phone');
      }
    }

    if (email) {
      const byEmail = await clients.findOne({
        where: { email },
        order: { id: 'ASC' },
      });
      if (byEmail) {
        return this.record(byEmail, 'matched_email');
      }
    }

    const created = await clients.save(
      clients.create({ name: contact.name, phone, email }),
    );
    return this.record(created, 'created');
  }

  private record(client: Client, outcome: ResolutionOutcome): ClientResolution {
    this.resolvedCounter.inc({ outcome });
    const redacted = redactContact(client);
    this.logger.log(
      `Client ${client.id} ${outcome} (phone ${redacted.phone || '-'}, email ${redacted.email || '-'})`,
    );
    return { client, outcome };
  }
}
