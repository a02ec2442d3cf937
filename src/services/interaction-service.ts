/**
 * Interaction Service: customer touchpoints
 *
 * Every write recomputes the owning customer's last_interacted_at in the same
 * transaction.
 */

import { randomUUID } from 'node:crypto';
import type { CrmDatabase } from '../store/database.js';
import { InteractionRepository } from '../store/interaction-repository.js';
import { CustomerRepository } from '../store/customer-repository.js';
import { resolvePage } from '../store/query.js';
import {
  InteractionCreateSchema,
  InteractionListQuerySchema,
  InteractionUpdateSchema,
  type Interaction,
  type Page,
} from '../domain/schemas.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('crm:interactions');

export class InteractionService {
  private readonly interactions: InteractionRepository;
  private readonly customers: CustomerRepository;

  constructor(private readonly db: CrmDatabase) {
    this.interactions = new InteractionRepository(db);
    this.customers = new CustomerRepository(db);
  }

  list(customerId: string, query: unknown): Page<Interaction> {
    const parsed = InteractionListQuerySchema.safeParse(query ?? {});
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid query parameters');
    }

    const page = resolvePage(parsed.data.page, parsed.data.page_size);
    const { rows, total } = this.interactions.list(
      customerId,
      { type: parsed.data.type, from: parsed.data.from, to: parsed.data.to },
      page
    );
    return { items: rows, total, page: page.page, pageSize: page.pageSize };
  }

  get(customerId: string, id: string): Interaction {
    const interaction = this.interactions.findForCustomer(customerId, id);
    if (!interaction) {
      throw new NotFoundError('Interaction', id);
    }
    return interaction;
  }

  create(customerId: string, payload: unknown): Interaction {
    const parsed = InteractionCreateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid interaction');
    }

    const now = new Date().toISOString();
    const interaction: Interaction = {
      id: randomUUID(),
      customerId,
      type: parsed.data.type,
      happenedAt: parsed.data.happenedAt,
      summary: parsed.data.summary ?? null,
      content: parsed.data.content ?? null,
      createdAt: now,
      updatedAt: now,
    };

    this.db.transaction('interaction.create', () => {
      this.assertCustomer(customerId);
      this.interactions.insert(interaction);
      this.customers.syncLastInteracted(customerId);
    });

    log.info({ customerId, interactionId: interaction.id, type: interaction.type }, 'Interaction created');
    return interaction;
  }

  update(customerId: string, id: string, payload: unknown): Interaction {
    const parsed = InteractionUpdateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid interaction');
    }

    const updated = this.db.transaction('interaction.update', () => {
      const existing = this.get(customerId, id);
      const next: Interaction = {
        ...existing,
        type: parsed.data.type ?? existing.type,
        happenedAt: parsed.data.happenedAt ?? existing.happenedAt,
        summary: parsed.data.summary !== undefined ? parsed.data.summary : existing.summary,
        content: parsed.data.content !== undefined ? parsed.data.content : existing.content,
        updatedAt: new Date().toISOString(),
      };
      this.interactions.update(next);
      this.customers.syncLastInteracted(customerId);
      return next;
    });

    log.info({ customerId, interactionId: id }, 'Interaction updated');
    return updated;
  }

  delete(customerId: string, id: string): void {
    this.db.transaction('interaction.delete', () => {
      if (!this.interactions.delete(customerId, id)) {
        throw new NotFoundError('Interaction', id);
      }
      this.customers.syncLastInteracted(customerId);
    });
    log.info({ customerId, interactionId: id }, 'Interaction deleted');
  }

  private assertCustomer(customerId: string): void {
    if (!this.customers.exists(customerId)) {
      throw new NotFoundError('Customer', customerId);
    }
  }
}
