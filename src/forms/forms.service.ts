import {
  BadRequestException,
  GoneException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { FormTemplate } from './form-template.entity';
import {
  contactProblems,
  missingRequiredFields,
  pickString,
  SubmissionContact,
} from './form-schema';
import { CreateFormTemplateDto } from './dto/create-form-template.dto';
import { PublicSubmissionDto } from './dto/public-submission.dto';
import { AccessPolicy, Actor } from '../accounts/access-policy.service';
import { IdentifierService } from '../identifiers/identifier.service';
import { ProductsService } from '../products/products.service';
import { LeadsService } from '../leads/leads.service';
import { Lead } from '../leads/lead.entity';

export type FormTemplateView = Omit<FormTemplate, 'shareUrl'> & {
  shareUrl: string | null;
};

/** Getters do not survive serialization; views carry the URL explicitly. */
export function toView(template: FormTemplate): FormTemplateView {
  return { ...template, shareUrl: template.shareUrl };
}

@Injectable()
export class FormsService {
  private readonly logger = new Logger(FormsService.name);

  constructor(
    @InjectRepository(FormTemplate)
    private readonly formRepository: Repository<FormTemplate>,
    private readonly accessPolicy: AccessPolicy,
    private readonly identifierService: IdentifierService,
    private readonly productsService: ProductsService,
    private readonly leadsService: LeadsService,
  ) {}

  async list(actor: Actor): Promise<FormTemplateView[]> {
    this.accessPolicy.assert(actor, 'form:view');

    const templates = await this.formRepository.find({
      where: { isActive: true },
      relations: { product: true },
      order: { title: 'ASC' },
    });
    return templates.map(toView);
  }

  async findOne(actor: Actor, id: number): Promise<FormTemplateView> {
    this.accessPolicy.assert(actor, 'form:view');

    const template = await this.formRepository.findOne({
      where: { id, isActive: true },
      relations: { product: true },
    });
    if (!template) {
      throw new NotFoundException(`Form template ${id} not found`);
    }
    return toView(template);
  }

  async create(
    actor: Actor,
    dto: CreateFormTemplateDto,
  ): Promise<FormTemplateView> {
    this.accessPolicy.assert(actor, 'form:add');

    if (dto.productId !== undefined) {
      const product = await this.productsService.findActiveById(dto.productId);
      if (!product) {
        throw new BadRequestException(
          'Invalid product ID or product is not active',
        );
      }
    }

    const isShareable = dto.isShareable ?? false;
    const template = await this.formRepository.save(
      this.formRepository.create({
        title: dto.title,
        description: dto.description ?? '',
        productId: dto.productId ?? null,
        schema: dto.schema,
        isShareable,
        shareToken: isShareable
          ? this.identifierService.generateShareToken()
          : null,
        shareExpiry: dto.shareExpiry ?? null,
        isActive: dto.isActive ?? true,
      }),
    );
    this.logger.log(`Form template ${template.id} created by user ${actor.id}`);
    return toView(template);
  }

  /** Template behind a share link, for anonymous callers. */
  async findShared(shareToken: string): Promise<FormTemplateView> {
    return toView(await this.findByToken(shareToken));
  }

  async submitShared(
    shareToken: string,
    dto: PublicSubmissionDto,
  ): Promise<Lead> {
    const template = await this.findByToken(shareToken);

    const missing = missingRequiredFields(template.schema, dto.formData);
    if (missing.length > 0) {
      throw new BadRequestException(
        `Missing required fields: ${missing.join(', ')}`,
      );
    }
    if (template.productId === null) {
      throw new BadRequestException('This form is not linked to a product');
    }

    // Values taken from formData never passed the DTO's validators
    const contact: SubmissionContact = {
      customerName:
        dto.customerName || pickString(dto.formData, 'customer_name', 'name'),
      customerEmail: dto.customerEmail || pickString(dto.formData, 'email'),
      customerPhone: dto.customerPhone || pickString(dto.formData, 'phone'),
    };
    const problems = contactProblems(contact);
    if (problems.length > 0) {
      throw new BadRequestException(problems);
    }

    return this.leadsService.createPublic(
      {
        productId: template.productId,
        formTemplateId: template.id,
        ...contact,
        formData: dto.formData,
      },
      template.title,
    );
  }

  private async findByToken(shareToken: string): Promise<FormTemplate> {
    const template = await this.formRepository.findOne({
      where: { shareToken, isShareable: true, isActive: true },
      relations: { product: true },
    });
    if (!template) {
      throw new NotFoundException('Form not found or not accessible');
    }
    if (template.shareExpiry && template.shareExpiry.getTime() < Date.now()) {
      throw new GoneException('This form link has expired');
    }
    return template;
  }
}
