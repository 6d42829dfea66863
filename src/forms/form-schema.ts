import { z } from 'zod';
import type { FormPayload } from '../leads/lead.entity';

/**
 * The only part of a template schema the server reads. Labels, widget types
 * and options pass through to clients untouched.
 */
const FormFieldSchema = z
  .object({
    name: z.string().min(1),
    required: z.boolean().optional(),
  })
  .passthrough();

const TemplateSchema = z
  .object({ fields: z.array(FormFieldSchema).default([]) })
  .passthrough();

export type FormField = z.infer<typeof FormFieldSchema>;

export function fieldsOf(schema: Record<string, unknown>): FormField[] {
  const parsed = TemplateSchema.safeParse(schema);
  return parsed.success ? parsed.data.fields : [];
}

function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim() === '')
  );
}

/** Names of required fields that are absent or blank in `data`. */
export function missingRequiredFields(
  schema: Record<string, unknown>,
  data: FormPayload,
): string[] {
  return fieldsOf(schema)
    .filter((field) => field.required === true && isBlank(data[field.name]))
    .map((field) => field.name);
}

/** First non-blank string among `keys` of the payload. */
export function pickString(data: FormPayload, ...keys: string[]): string {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
    if (typeof value === 'number') {
      return String(value);
    }
  }
  return '';
}

/** Column limits of the lead and client contact fields. */
export const SubmissionContactSchema = z.object({
  customerName: z
    .string()
    .max(200, 'customerName must be shorter than or equal to 200 characters'),
  customerEmail: z.union([
    z.literal(''),
    z
      .string()
      .max(254, 'customerEmail must be shorter than or equal to 254 characters')
      .email('customerEmail must be an email'),
  ]),
  customerPhone: z
    .string()
    .max(20, 'customerPhone must be shorter than or equal to 20 characters'),
});

export type SubmissionContact = z.infer<typeof SubmissionContactSchema>;

/** Validation messages for contact details, empty when they fit. */
export function contactProblems(contact: SubmissionContact): string[] {
  const parsed = SubmissionContactSchema.safeParse(contact);
  if (parsed.success) {
    return [];
  }
  return parsed.error.issues.map((issue) => issue.message);
}
