import {
  BadRequestException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter } from 'prom-client';
import { DataSource, DeepPartial, EntityManager, Repository } from 'typeorm';
import { Lead } from './lead.entity';
import type { FormPayload, LeadStatus } from './lead.entity';
import { LeadActivity } from './lead-activity.entity';
import type { ActivityType } from './lead-activity.entity';
import { CreateLeadDto } from './dto/create-lead.dto';
import { UpdateLeadDto } from './dto/update-lead.dto';
import { SubmitLeadDto } from './dto/submit-lead.dto';
import { AddNoteDto } from './dto/add-note.dto';
import { AssignLeadDto } from './dto/assign-lead.dto';
import { ListLeadsQueryDto, LeadOrdering } from './dto/list-leads-query.dto';
import { Agent } from '../accounts/agent.entity';
import { User } from '../accounts/user.entity';
import { AccountsService } from '../accounts/accounts.service';
import { AccessPolicy, Action } from '../accounts/access-policy.service';
import { ClientResolver } from '../clients/client-resolver.service';
import { IdentifierService } from '../identifiers/identifier.service';
import { ProductsService } from '../products/products.service';
import { Product } from '../products/product.entity';
import { LeadDocumentService } from '../documents/lead-document.service';
import { LEADS_CREATED_TOTAL } from '../common/metrics.providers';
import { Page, pageOf, PAGE_SIZE, skipFor } from '../common/pagination';

export const PUBLIC_SHARE_SOURCE = 'public_share';
const DEFAULT_SOURCE = 'mobile_app';

/** Contact details and payload of a new lead, from either entry point. */
export interface LeadSubmission {
  productId: number;
  formTemplateId?: number | null;
  customerName: string;
  customerEmail?: string;
  customerPhone?: string;
  formData?: FormPayload;
  source?: string;
  referralCode?: string;
  status?: LeadStatus;
}

interface CreationContext {
  agent: Agent | null;
  userId: number | null;
  source: string;
  status: LeadStatus;
  description: string;
}

export interface LeadDocumentLink {
  path: string | null;
  url: string;
}

export interface LeadStats {
  total: number;
  byStatus: Record<LeadStatus, number>;
}

const ORDERINGS: Record<
  LeadOrdering,
  { column: 'createdAt' | 'updatedAt' | 'status'; direction: 'ASC' | 'DESC' }
> = {
  createdAt: { column: 'createdAt', direction: 'ASC' },
  '-createdAt': { column: 'createdAt', direction: 'DESC' },
  updatedAt: { column: 'updatedAt', direction: 'ASC' },
  '-updatedAt': { column: 'updatedAt', direction: 'DESC' },
  status: { column: 'status', direction: 'ASC' },
  '-status': { column: 'status', direction: 'DESC' },
};

const DETAIL_RELATIONS = {
  product: { subCategory: { mainCategory: true } },
  agent: true,
  client: true,
  assignedTo: true,
  activities: true,
} as const;

@Injectable()
export class LeadsService {
  private readonly logger = new Logger(LeadsService.name);

  constructor(
    @InjectRepository(Lead)
    private readonly leadRepository: Repository<Lead>,
    private readonly dataSource: DataSource,
    private readonly accessPolicy: AccessPolicy,
    private readonly accountsService: AccountsService,
    private readonly productsService: ProductsService,
    private readonly clientResolver: ClientResolver,
    private readonly identifierService: IdentifierService,
    private readonly documentService: LeadDocumentService,
    @InjectMetric(LEADS_CREATED_TOTAL)
    private readonly leadsCreatedCounter: Counter<string>,
  ) {}

  /** Lead filed under the acting user's agent profile. */
  async createForAgent(actor: User, dto: CreateLeadDto): Promise<Lead> {
    this.accessPolicy.assert(actor, 'lead:add');
    const agent = actor.agent;
    if (!agent) {
      throw new ForbiddenException(
        'User must have an agent profile to create leads',
      );
    }

    return this.create(dto, {
      agent,
      userId: actor.id,
      source: dto.source || DEFAULT_SOURCE,
      status: dto.status ?? 'submitted',
      description: `Lead created by agent ${agent.agentCode}`,
    });
  }

  /** Anonymous submission through a shared form; no agent attached. */
  async createPublic(submission: LeadSubmission, formTitle: string): Promise<Lead> {
    return this.create(submission, {
      agent: null,
      userId: null,
      source: PUBLIC_SHARE_SOURCE,
      status: 'submitted',
      description: `Lead submitted via public form "${formTitle}"`,
    });
  }

  /**
   * Client resolution, reference assignment, the lead row and its `created`
   * activity commit together. The PDF runs afterwards and never fails the
   * request.
   */
  private async create(
    submission: LeadSubmission,
    context: CreationContext,
  ): Promise<Lead> {
    const product = await this.productsService.findActiveById(
      submission.productId,
    );
    if (!product) {
      throw new BadRequestException(
        'Invalid product ID or product is not active',
      );
    }

    const lead = await this.dataSource.transaction((manager) =>
      this.persist(manager, product, submission, context),
    );

    this.leadsCreatedCounter.inc({ source: context.source });
    this.logger.log(
      `Lead ${lead.referenceNumber} created (source ${context.source})`,
    );

    const documentLead = await this.leadRepository.findOne({
      where: { id: lead.id },
      relations: { product: { subCategory: true }, agent: { user: true } },
    });
    if (documentLead) {
      await this.documentService.generate(documentLead, context.userId);
    }

    return this.loadDetail(lead.id);
  }

  private async persist(
    manager: EntityManager,
    product: Product,
    submission: LeadSubmission,
    context: CreationContext,
  ): Promise<Lead> {
    const customerPhone = submission.customerPhone ?? '';
    const customerEmail = submission.customerEmail ?? '';

    const client = await this.clientResolver.resolve(
      {
        phone: customerPhone,
        email: customerEmail,
        name: submission.customerName,
      },
      manager,
    );

    const referenceNumber = await this.identifierService.generateLeadReference(
      product.subCategory.name,
      new Date().getUTCFullYear(),
      manager,
    );

    const leads = manager.getRepository(Lead);
    const lead = await leads.save(
      leads.create({
        referenceNumber,
        productId: product.id,
        agentId: context.agent?.id ?? null,
        clientId: client.id,
        formTemplateId: submission.formTemplateId ?? null,
        customerName: submission.customerName,
        customerEmail,
        customerPhone,
        formData: submission.formData ?? {},
        source: context.source,
        referralCode: submission.referralCode ?? '',
        status: context.status,
      }),
    );

    await this.record(manager, lead, 'created', context.description, {
      userId: context.userId,
    });

    return lead;
  }

  async list(actor: User, query: ListLeadsQueryDto): Promise<Page<Lead>> {
    this.accessPolicy.assert(actor, 'lead:view');
    const page = query.page ?? 1;

    const agentId = this.accessPolicy.scopeFor(actor);
    if (agentId === undefined) {
      return pageOf([], 0, page);
    }

    const qb = this.leadRepository
      .createQueryBuilder('lead')
      .leftJoinAndSelect('lead.product', 'product')
      .leftJoinAndSelect('product.subCategory', 'subCategory')
      .leftJoinAndSelect('lead.agent', 'agent');

    if (agentId !== null) {
      qb.andWhere('lead.agentId = :agentId', { agentId });
    }
    if (query.status) {
      qb.andWhere('lead.status = :status', { status: query.status });
    }
    if (query.product !== undefined) {
      qb.andWhere('lead.productId = :productId', { productId: query.product });
    }
    if (query.subCategory !== undefined) {
      qb.andWhere('product.subCategoryId = :subCategoryId', {
        subCategoryId: query.subCategory,
      });
    }
    if (query.createdAfter) {
      qb.andWhere('lead.createdAt >= :createdAfter', {
        createdAfter: query.createdAfter,
      });
    }
    if (query.createdBefore) {
      qb.andWhere('lead.createdAt <= :createdBefore', {
        createdBefore: query.createdBefore,
      });
    }
    if (query.search) {
      qb.andWhere(
        '(LOWER(lead.referenceNumber) LIKE :search OR LOWER(lead.customerName) LIKE :search' +
          ' OR LOWER(lead.customerPhone) LIKE :search OR LOWER(lead.customerEmail) LIKE :search)',
        { search: `%${query.search.toLowerCase()}%` },
      );
    }

    const { column, direction } = ORDERINGS[query.ordering ?? '-createdAt'];
    qb.orderBy(`lead.${column}`, direction)
      .addOrderBy('lead.id', direction)
      .skip(skipFor(page))
      .take(PAGE_SIZE);

    const [results, count] = await qb.getManyAndCount();
    return pageOf(results, count, page);
  }

  async findOne(actor: User, id: number): Promise<Lead> {
    await this.findAccessible(actor, id, 'lead:view');
    return this.loadDetail(id);
  }

  async update(actor: User, id: number, dto: UpdateLeadDto): Promise<Lead> {
    const lead = await this.findAccessible(actor, id, 'lead:change');
    const oldStatus = lead.status;

    const changes: DeepPartial<Lead> = {};
    if (dto.customerName !== undefined) changes.customerName = dto.customerName;
    if (dto.customerEmail !== undefined) changes.customerEmail = dto.customerEmail;
    if (dto.customerPhone !== undefined) changes.customerPhone = dto.customerPhone;
    if (dto.formData !== undefined) changes.formData = dto.formData;
    if (dto.source !== undefined) changes.source = dto.source;
    if (dto.referralCode !== undefined) changes.referralCode = dto.referralCode;

    const newStatus = dto.status ?? oldStatus;
    if (newStatus !== oldStatus) {
      changes.status = newStatus;
      if (newStatus === 'converted') {
        changes.convertedAt = new Date();
      }
    }

    await this.dataSource.transaction(async (manager) => {
      if (Object.keys(changes).length > 0) {
        // update() cannot take the untyped JSON column
        await manager.getRepository(Lead).save({ ...changes, id: lead.id });
      }
      if (newStatus !== oldStatus) {
        await this.record(
          manager,
          lead,
          'status_change',
          `Status changed from ${oldStatus} to ${newStatus}`,
          {
            userId: actor.id,
            metadata: { old_status: oldStatus, new_status: newStatus },
          },
        );
      }
    });

    return this.loadDetail(id);
  }

  async submit(actor: User, id: number, dto: SubmitLeadDto): Promise<Lead> {
    const lead = await this.findAccessible(actor, id, 'lead:change');
    if (lead.status !== 'draft') {
      throw new BadRequestException('Only draft leads can be submitted');
    }

    const description = dto.notes
      ? `Lead submitted: ${dto.notes}`
      : 'Lead submitted';

    await this.dataSource.transaction(async (manager) => {
      await manager.getRepository(Lead).update(lead.id, { status: 'submitted' });
      await this.record(manager, lead, 'status_change', description, {
        userId: actor.id,
        metadata: { old_status: 'draft', new_status: 'submitted' },
      });
    });

    return this.loadDetail(id);
  }

  async addNote(
    actor: User,
    id: number,
    dto: AddNoteDto,
  ): Promise<LeadActivity> {
    const lead = await this.findAccessible(actor, id, 'lead:change');
    return this.record(this.dataSource.manager, lead, 'note_added', dto.note, {
      userId: actor.id,
    });
  }

  async assign(actor: User, id: number, dto: AssignLeadDto): Promise<Lead> {
    const lead = await this.findAccessible(actor, id, 'lead:assign');
    const assignee = await this.accountsService.findById(dto.userId);
    if (!assignee) {
      throw new NotFoundException(`User ${dto.userId} not found`);
    }

    await this.dataSource.transaction(async (manager) => {
      await manager
        .getRepository(Lead)
        .update(lead.id, { assignedToId: assignee.id });
      await this.record(
        manager,
        lead,
        'assigned',
        `Lead assigned to ${assignee.fullName || assignee.username}`,
        { userId: actor.id, metadata: { assigned_to: assignee.id } },
      );
    });

    return this.loadDetail(id);
  }

  /** Drafts only; anything further along is part of the audit record. */
  async remove(actor: User, id: number): Promise<void> {
    const lead = await this.findAccessible(actor, id, 'lead:delete');
    if (lead.status !== 'draft') {
      throw new BadRequestException('Only draft leads can be deleted');
    }
    await this.leadRepository.delete(lead.id);
    await this.documentService.discard(lead);
    this.logger.log(`Draft lead ${lead.referenceNumber} deleted by user ${actor.id}`);
  }

  async stats(actor: User): Promise<LeadStats> {
    this.accessPolicy.assert(actor, 'lead:view');

    const byStatus = emptyStatusCounts();
    const agentId = this.accessPolicy.scopeFor(actor);
    if (agentId === undefined) {
      return { total: 0, byStatus };
    }

    const qb = this.leadRepository
      .createQueryBuilder('lead')
      .select('lead.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('lead.status');
    if (agentId !== null) {
      qb.where('lead.agentId = :agentId', { agentId });
    }

    const rows = await qb.getRawMany<{ status: LeadStatus; count: string | number }>();
    let total = 0;
    for (const row of rows) {
      const count = Number(row.count);
      byStatus[row.status] = count;
      total += count;
    }
    return { total, byStatus };
  }

  /** Stored PDF of the lead; callers must expect it to be missing. */
  async document(actor: User, id: number): Promise<LeadDocumentLink> {
    const lead = await this.findAccessible(actor, id, 'lead:view');
    if (!lead.pdfUrl) {
      throw new NotFoundException(
        `No document has been generated for lead ${lead.referenceNumber}`,
      );
    }
    return { path: lead.pdfPath, url: lead.pdfUrl };
  }

  /**
   * Out-of-scope leads read as missing, the way a filtered listing would
   * hide them.
   */
  private async findAccessible(
    actor: User,
    id: number,
    action: Action,
  ): Promise<Lead> {
    this.accessPolicy.assert(actor, action);
    const lead = await this.leadRepository.findOne({ where: { id } });
    if (!lead || !this.accessPolicy.can(actor, action, lead)) {
      throw new NotFoundException(`Lead ${id} not found`);
    }
    return lead;
  }

  private async loadDetail(id: number): Promise<Lead> {
    const lead = await this.leadRepository.findOne({
      where: { id },
      relations: DETAIL_RELATIONS,
      order: { activities: { createdAt: 'DESC', id: 'DESC' } },
    });
    if (!lead) {
      throw new NotFoundException(`Lead ${id} not found`);
    }
    return lead;
  }

  private async record(
    manager: EntityManager,
    lead: Lead,
    activityType: ActivityType,
    description: string,
    options: { userId: number | null; metadata?: Record<string, unknown> },
  ): Promise<LeadActivity> {
    const activities = manager.getRepository(LeadActivity);
    return activities.save(
      activities.create({
        leadId: lead.id,
        userId: options.userId,
        activityType,
        description,
        metadata: options.metadata ?? {},
      }),
    );
  }
}

function emptyStatusCounts(): Record<LeadStatus, number> {
  return {
    draft: 0,
    submitted: 0,
    in_progress: 0,
    approved: 0,
    rejected: 0,
    converted: 0,
  };
}
