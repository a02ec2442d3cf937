/**
 * CRM: Entity Schemas
 *
 * Zod schemas for every entity payload and list query, and the TypeScript
 * shapes of the records the services return.
 *
 * @module domain/schemas
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const CustomerStatusSchema = z.enum(['lead', 'prospect', 'active', 'inactive', 'churned']);
export type CustomerStatus = z.infer<typeof CustomerStatusSchema>;

export const InteractionTypeSchema = z.enum(['call', 'meeting', 'email', 'note', 'other']);
export type InteractionType = z.infer<typeof InteractionTypeSchema>;

export const OpportunityStatusSchema = z.enum(['open', 'won', 'lost']);
export type OpportunityStatus = z.infer<typeof OpportunityStatusSchema>;

export const FieldTypeSchema = z.enum([
  'text',
  'number',
  'date',
  'email',
  'phone',
  'single_select',
  'multi_select',
  'bool',
]);
export type FieldType = z.infer<typeof FieldTypeSchema>;

export const SortDirectionSchema = z.enum(['asc', 'desc']);
export type SortDirection = z.infer<typeof SortDirectionSchema>;

export const CUSTOMER_SORT_FIELDS = [
  'name',
  'company',
  'email',
  'status',
  'created_at',
  'updated_at',
  'last_interacted_at',
] as const;
export const CustomerSortFieldSchema = z.enum(CUSTOMER_SORT_FIELDS);
export type CustomerSortField = z.infer<typeof CustomerSortFieldSchema>;

export const PHONE_PATTERN = /^[+0-9().\- ]+$/;
export const FIELD_KEY_PATTERN = /^[A-Za-z0-9_]+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export const MAX_TAGS = 20;

// ═══════════════════════════════════════════════════════════════════════════
// PRIMITIVES
// ═══════════════════════════════════════════════════════════════════════════

export function isIsoDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const [year, month, day] = value.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function isTimestamp(value: string): boolean {
  return TIMESTAMP_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
}

/** Keep the first occurrence of each tag, in order. */
export function uniqueTags(tags: string[]): string[] {
  return [...new Set(tags)];
}

/** Optional free text: trimmed, empty collapses to null. */
function optionalText(max: number) {
  return z
    .string()
    .trim()
    .max(max)
    .transform((value) => (value === '' ? null : value))
    .nullable()
    .optional();
}

export const EmailSchema = z.string().trim().toLowerCase().email({ message: 'Invalid email format' });

export const PhoneSchema = z
  .string()
  .trim()
  .min(7)
  .max(32)
  .regex(PHONE_PATTERN, { message: 'Invalid phone number format' });

export const TagSchema = z.string().trim().min(1, { message: 'Tags must not be empty' }).max(30);

export const TagsSchema = z.array(TagSchema).max(MAX_TAGS).transform(uniqueTags);

export const IsoDateSchema = z
  .string()
  .trim()
  .refine(isIsoDate, { message: 'Expected a date in YYYY-MM-DD format' });

/** Any parseable ISO-8601 timestamp, normalised to UTC. */
export const TimestampSchema = z
  .string()
  .trim()
  .refine(isTimestamp, { message: 'Expected an ISO-8601 timestamp' })
  .transform((value) => new Date(value).toISOString());

/** A date stays a date; a timestamp is normalised to UTC. */
export const DateOrTimestampSchema = z
  .string()
  .trim()
  .refine((value) => isIsoDate(value) || isTimestamp(value), {
    message: 'Expected a YYYY-MM-DD date or an ISO-8601 timestamp',
  })
  .transform((value) => (isIsoDate(value) ? value : new Date(value).toISOString()));

export const CustomPayloadSchema = z.record(z.string(), z.unknown());

// ═══════════════════════════════════════════════════════════════════════════
// CUSTOMER
// ═══════════════════════════════════════════════════════════════════════════

const customerFields = {
  name: z.string().trim().min(1, { message: 'name is required' }).max(200),
  company: optionalText(200),
  title: optionalText(120),
  email: EmailSchema.nullable().optional(),
  phone: PhoneSchema.nullable().optional(),
  note: optionalText(5000),
  status: CustomerStatusSchema,
  tags: TagsSchema,
  custom: CustomPayloadSchema,
};

export const CustomerCreateSchema = z
  .object({
    ...customerFields,
    status: customerFields.status.default('lead'),
    tags: customerFields.tags.default([]),
    custom: customerFields.custom.default({}),
  })
  .strict();
export type CustomerCreateInput = z.infer<typeof CustomerCreateSchema>;

export const CustomerUpdateSchema = z
  .object({
    name: customerFields.name.optional(),
    company: customerFields.company,
    title: customerFields.title,
    email: customerFields.email,
    phone: customerFields.phone,
    note: customerFields.note,
    status: customerFields.status.optional(),
    tags: customerFields.tags.optional(),
    custom: customerFields.custom.optional(),
  })
  .strict();
export type CustomerUpdateInput = z.infer<typeof CustomerUpdateSchema>;

export type CustomFieldJson = string | number | boolean | string[];

export interface Customer {
  id: string;
  name: string;
  company: string | null;
  title: string | null;
  email: string | null;
  phone: string | null;
  note: string | null;
  status: CustomerStatus;
  tags: string[];
  custom: Record<string, CustomFieldJson>;
  lastInteractedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// INTERACTION
// ═══════════════════════════════════════════════════════════════════════════

export const InteractionCreateSchema = z
  .object({
    type: InteractionTypeSchema,
    happenedAt: TimestampSchema,
    summary: optionalText(500),
    content: optionalText(20000),
  })
  .strict();
export type InteractionCreateInput = z.infer<typeof InteractionCreateSchema>;

export const InteractionUpdateSchema = z
  .object({
    type: InteractionTypeSchema.optional(),
    happenedAt: TimestampSchema.optional(),
    summary: optionalText(500),
    content: optionalText(20000),
  })
  .strict();
export type InteractionUpdateInput = z.infer<typeof InteractionUpdateSchema>;

export interface Interaction {
  id: string;
  customerId: string;
  type: InteractionType;
  happenedAt: string;
  summary: string | null;
  content: string | null;
  createdAt: string;
  updatedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// OPPORTUNITY
// ═══════════════════════════════════════════════════════════════════════════

const AmountSchema = z
  .number({ invalid_type_error: 'amount must be a number' })
  .finite()
  .nonnegative({ message: 'amount must not be negative' });

export const OpportunityCreateSchema = z
  .object({
    name: z.string().trim().min(1, { message: 'name is required' }).max(200),
    description: optionalText(5000),
    status: OpportunityStatusSchema.default('open'),
    amount: AmountSchema.default(0),
    probability: z.number().int().min(0).max(100).nullable().optional(),
    expectedCloseDate: IsoDateSchema.nullable().optional(),
  })
  .strict();
export type OpportunityCreateInput = z.infer<typeof OpportunityCreateSchema>;

export const OpportunityUpdateSchema = z
  .object({
    name: z.string().trim().min(1, { message: 'name is required' }).max(200).optional(),
    description: optionalText(5000),
    status: OpportunityStatusSchema.optional(),
    amount: AmountSchema.optional(),
    probability: z.number().int().min(0).max(100).nullable().optional(),
    expectedCloseDate: IsoDateSchema.nullable().optional(),
  })
  .strict();
export type OpportunityUpdateInput = z.infer<typeof OpportunityUpdateSchema>;

export interface Opportunity {
  id: string;
  customerId: string;
  name: string;
  description: string | null;
  status: OpportunityStatus;
  amount: number;
  probability: number | null;
  expectedCloseDate: string | null;
  createdAt: string;
  updatedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// TASK / REMINDER
// ═══════════════════════════════════════════════════════════════════════════

export const TaskCreateSchema = z
  .object({
    remindAt: DateOrTimestampSchema,
    content: z.string().trim().min(1, { message: 'content is required' }).max(5000),
    done: z.boolean().default(false),
    syncExternal: z.boolean().default(false),
  })
  .strict();
export type TaskCreateInput = z.infer<typeof TaskCreateSchema>;

export const TaskUpdateSchema = z
  .object({
    remindAt: DateOrTimestampSchema.optional(),
    content: z.string().trim().min(1, { message: 'content is required' }).max(5000).optional(),
    done: z.boolean().optional(),
    syncExternal: z.boolean().optional(),
  })
  .strict();
export type TaskUpdateInput = z.infer<typeof TaskUpdateSchema>;

export interface Task {
  id: string;
  customerId: string;
  remindAt: string;
  content: string;
  done: boolean;
  syncExternal: boolean;
  createdAt: string;
  updatedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// CUSTOM FIELD DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════

export const FieldKeySchema = z
  .string()
  .trim()
  .min(1)
  .max(100)
  .regex(FIELD_KEY_PATTERN, { message: 'Key must match pattern [A-Za-z0-9_]' });

const FieldOptionsSchema = z
  .array(z.string().trim().min(1, { message: 'Options must not be empty' }))
  .transform((options) => [...new Set(options)]);

const fieldDefinitionBody = z.object({
  label: z.string().trim().min(1).max(255),
  type: FieldTypeSchema,
  options: FieldOptionsSchema.nullable().optional(),
  required: z.boolean().default(false),
});

function refineOptions<T extends { type: FieldType; options?: string[] | null }>(value: T, ctx: z.RefinementCtx): void {
  const isSelect = value.type === 'single_select' || value.type === 'multi_select';
  if (isSelect && (!value.options || value.options.length === 0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['options'], message: 'Options are required for select fields' });
  }
  if (!isSelect && value.options != null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['options'], message: 'Options are only allowed for select fields' });
  }
}

export const FieldDefinitionCreateSchema = fieldDefinitionBody
  .extend({ key: FieldKeySchema })
  .strict()
  .superRefine(refineOptions);
export type FieldDefinitionCreateInput = z.infer<typeof FieldDefinitionCreateSchema>;

export const FieldDefinitionUpdateSchema = fieldDefinitionBody
  .extend({ key: FieldKeySchema.optional() })
  .strict()
  .superRefine(refineOptions);
export type FieldDefinitionUpdateInput = z.infer<typeof FieldDefinitionUpdateSchema>;

export interface FieldDefinition {
  key: string;
  label: string;
  type: FieldType;
  options: string[] | null;
  required: boolean;
  createdAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// LIST QUERIES
// ═══════════════════════════════════════════════════════════════════════════

/** Query strings arrive as strings; repeated keys arrive as arrays. */
const queryString = z.preprocess(
  (value) => (Array.isArray(value) ? value[0] : value),
  z.string().trim().optional()
).transform((value) => (value === '' ? undefined : value));

const queryList = z.preprocess(
  (value) => {
    if (value === undefined) return [];
    const values = Array.isArray(value) ? value : [value];
    return values
      .flatMap((item) => String(item).split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  },
  z.array(z.string())
);

const queryBoolean = z.preprocess((value) => {
  if (value === undefined || value === '') return undefined;
  if (typeof value === 'boolean') return value;
  const lowered = String(value).toLowerCase();
  if (['true', '1', 'yes'].includes(lowered)) return true;
  if (['false', '0', 'no'].includes(lowered)) return false;
  return value;
}, z.boolean().optional());

export const PaginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1, { message: 'page must be at least 1' }).default(1),
  page_size: z.coerce.number().int().min(1, { message: 'page_size must be at least 1' }).optional(),
});

export const CustomerListQuerySchema = PaginationQuerySchema.extend({
  search: queryString,
  status: queryString.pipe(CustomerStatusSchema.optional()),
  tag: queryList,
  company: queryString,
  sort_by: queryString.pipe(CustomerSortFieldSchema.optional()),
  sort_dir: queryString.pipe(SortDirectionSchema.optional()),
  last_interacted_before: queryString.pipe(TimestampSchema.optional()),
  last_interacted_after: queryString.pipe(TimestampSchema.optional()),
});
export type CustomerListQuery = z.infer<typeof CustomerListQuerySchema>;

/** Export takes the list filters plus an inclusive last-interaction window. */
export const CustomerExportQuerySchema = CustomerListQuerySchema.extend({
  from: queryString.pipe(TimestampSchema.optional()),
  to: queryString.pipe(TimestampSchema.optional()),
  include_private: queryBoolean,
});
export type CustomerExportQuery = z.infer<typeof CustomerExportQuerySchema>;

export const InteractionListQuerySchema = PaginationQuerySchema.extend({
  type: queryString.pipe(InteractionTypeSchema.optional()),
  from: queryString.pipe(TimestampSchema.optional()),
  to: queryString.pipe(TimestampSchema.optional()),
});
export type InteractionListQuery = z.infer<typeof InteractionListQuerySchema>;

export const OpportunityListQuerySchema = PaginationQuerySchema.extend({
  status: queryString.pipe(OpportunityStatusSchema.optional()),
});
export type OpportunityListQuery = z.infer<typeof OpportunityListQuerySchema>;

export const TaskListQuerySchema = PaginationQuerySchema.extend({
  done: queryBoolean,
  from: queryString.pipe(DateOrTimestampSchema.optional()),
  to: queryString.pipe(DateOrTimestampSchema.optional()),
});
export type TaskListQuery = z.infer<typeof TaskListQuerySchema>;

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}
