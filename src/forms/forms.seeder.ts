import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { FormTemplate } from './form-template.entity';
import { Product } from '../products/product.entity';
import { IdentifierService } from '../identifiers/identifier.service';

const FormTemplateSeedSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  productSlug: z.string().optional(),
  isShareable: z.boolean().default(false),
  schema: z.record(z.unknown()),
});

export const FormTemplatesSeedSchema = z.object({
  templates: z.array(FormTemplateSeedSchema),
});

export type FormTemplatesSeed = z.infer<typeof FormTemplatesSeedSchema>;

export const DEFAULT_FORM_TEMPLATES_PATH = join(
  __dirname,
  '..',
  '..',
  'data',
  'form-templates.json',
);

/** Get-or-create by title; runs after the catalog so products resolve. */
@Injectable()
export class FormsSeeder {
  private readonly logger = new Logger(FormsSeeder.name);

  constructor(
    @InjectRepository(FormTemplate)
    private readonly formRepository: Repository<FormTemplate>,
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
    private readonly identifierService: IdentifierService,
  ) {}

  async seedFromFile(path = DEFAULT_FORM_TEMPLATES_PATH): Promise<number> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
    return this.seed(FormTemplatesSeedSchema.parse(raw));
  }

  async seed(seed: FormTemplatesSeed): Promise<number> {
    let created = 0;

    for (const { productSlug, ...fields } of seed.templates) {
      const exists = await this.formRepository.exists({
        where: { title: fields.title },
      });
      if (exists) {
        continue;
      }

      let productId: number | null = null;
      if (productSlug) {
        const product = await this.productRepository.findOne({
          where: { slug: productSlug },
        });
        if (!product) {
          this.logger.warn(
            `Product ${productSlug} not found; ${fields.title} left unlinked`,
          );
        }
        productId = product?.id ?? null;
      }

      await this.formRepository.save(
        this.formRepository.create({
          ...fields,
          productId,
          shareToken: fields.isShareable
            ? this.identifierService.generateShareToken()
            : null,
        }),
      );
      created++;
      this.logger.log(`Created form template ${fields.title}`);
    }

    return created;
  }
}
