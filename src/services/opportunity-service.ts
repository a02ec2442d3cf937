import { randomUUID } from 'node:crypto';
import type { CrmDatabase } from '../store/database.js';
import { OpportunityRepository } from '../store/opportunity-repository.js';
import { CustomerRepository } from '../store/customer-repository.js';
import { resolvePage } from '../store/query.js';
import {
  OpportunityCreateSchema,
  OpportunityListQuerySchema,
  OpportunityUpdateSchema,
  type Opportunity,
  type Page,
} from '../domain/schemas.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('crm:opportunities');

export class OpportunityService {
  private readonly opportunities: OpportunityRepository;
  private readonly customers: CustomerRepository;

  constructor(private readonly db: CrmDatabase) {
    this.opportunities = new OpportunityRepository(db);
    this.customers = new CustomerRepository(db);
  }

  list(customerId: string, query: unknown): Page<Opportunity> {
    const parsed = OpportunityListQuerySchema.safeParse(query ?? {});
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid query parameters');
    }

    const page = resolvePage(parsed.data.page, parsed.data.page_size);
    const { rows, total } = this.opportunities.list(customerId, { status: parsed.data.status }, page);
    return { items: rows, total, page: page.page, pageSize: page.pageSize };
  }

  get(customerId: string, id: string): Opportunity {
    const opportunity = this.opportunities.findForCustomer(customerId, id);
    if (!opportunity) {
      throw new NotFoundError('Opportunity', id);
    }
    return opportunity;
  }

  create(customerId: string, payload: unknown): Opportunity {
    const parsed = OpportunityCreateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid opportunity');
    }

    const now = new Date().toISOString();
    const opportunity: Opportunity = {
      id: randomUUID(),
      customerId,
      name: parsed.data.name,
      description: parsed.data.description ?? null,
      status: parsed.data.status,
      amount: parsed.data.amount,
      probability: parsed.data.probability ?? null,
      expectedCloseDate: parsed.data.expectedCloseDate ?? null,
      createdAt: now,
      updatedAt: now,
    };

    this.db.transaction('opportunity.create', () => {
      this.assertCustomer(customerId);
      this.opportunities.insert(opportunity);
    });

    log.info({ customerId, opportunityId: opportunity.id, amount: opportunity.amount }, 'Opportunity created');
    return opportunity;
  }

  update(customerId: string, id: string, payload: unknown): Opportunity {
    const parsed = OpportunityUpdateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid opportunity');
    }

    const changes = parsed.data;
    const updated = this.db.transaction('opportunity.update', () => {
      const existing = this.get(customerId, id);
      const next: Opportunity = {
        ...existing,
        name: changes.name ?? existing.name,
        description: changes.description !== undefined ? changes.description : existing.description,
        status: changes.status ?? existing.status,
        amount: changes.amount ?? existing.amount,
        probability: changes.probability !== undefined ? changes.probability : existing.probability,
        expectedCloseDate:
          changes.expectedCloseDate !== undefined ? changes.expectedCloseDate : existing.expectedCloseDate,
        updatedAt: new Date().toISOString(),
      };
      this.opportunities.update(next);
      return next;
    });

    log.info({ customerId, opportunityId: id, status: updated.status }, 'Opportunity updated');
    return updated;
  }

  delete(customerId: string, id: string): void {
    if (!this.opportunities.delete(customerId, id)) {
      throw new NotFoundError('Opportunity', id);
    }
    log.info({ customerId, opportunityId: id }, 'Opportunity deleted');
  }

  private assertCustomer(customerId: string): void {
    if (!this.customers.exists(customerId)) {
      throw new NotFoundError('Customer', customerId);
    }
  }
}
