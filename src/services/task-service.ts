/**
 * Task Service: follow-up reminders attached to a customer
 *
 * `remindAt` keeps a bare date as given and normalises timestamps to UTC.
 * `syncExternal` is stored for a calendar sync that runs elsewhere.
 */

import { randomUUID } from 'node:crypto';
import type { CrmDatabase } from '../store/database.js';
import { TaskRepository } from '../store/task-repository.js';
import { CustomerRepository } from '../store/customer-repository.js';
import { resolvePage } from '../store/query.js';
import { TaskCreateSchema, TaskListQuerySchema, TaskUpdateSchema, type Page, type Task } from '../domain/schemas.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('crm:tasks');

export class TaskService {
  private readonly tasks: TaskRepository;
  private readonly customers: CustomerRepository;

  constructor(private readonly db: CrmDatabase) {
    this.tasks = new TaskRepository(db);
    this.customers = new CustomerRepository(db);
  }

  list(customerId: string, query: unknown): Page<Task> {
    const parsed = TaskListQuerySchema.safeParse(query ?? {});
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid query parameters');
    }

    const page = resolvePage(parsed.data.page, parsed.data.page_size);
    const { rows, total } = this.tasks.list(
      customerId,
      { done: parsed.data.done, from: parsed.data.from, to: parsed.data.to },
      page
    );
    return { items: rows, total, page: page.page, pageSize: page.pageSize };
  }

  get(customerId: string, id: string): Task {
    const task = this.tasks.findForCustomer(customerId, id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    return task;
  }

  create(customerId: string, payload: unknown): Task {
    const parsed = TaskCreateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid task');
    }

    const now = new Date().toISOString();
    const task: Task = {
      id: randomUUID(),
      customerId,
      remindAt: parsed.data.remindAt,
      content: parsed.data.content,
      done: parsed.data.done,
      syncExternal: parsed.data.syncExternal,
      createdAt: now,
      updatedAt: now,
    };

    this.db.transaction('task.create', () => {
      this.assertCustomer(customerId);
      this.tasks.insert(task);
    });

    log.info({ customerId, taskId: task.id, remindAt: task.remindAt }, 'Task created');
    return task;
  }

  update(customerId: string, id: string, payload: unknown): Task {
    const parsed = TaskUpdateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid task');
    }

    const updated = this.db.transaction('task.update', () => {
      const existing = this.get(customerId, id);
      const next: Task = {
        ...existing,
        remindAt: parsed.data.remindAt ?? existing.remindAt,
        content: parsed.data.content ?? existing.content,
        done: parsed.data.done ?? existing.done,
        syncExternal: parsed.data.syncExternal ?? existing.syncExternal,
        updatedAt: new Date().toISOString(),
      };
      this.tasks.update(next);
      return next;
    });

    log.info({ customerId, taskId: id, done: updated.done }, 'Task updated');
    return updated;
  }

  delete(customerId: string, id: string): void {
    if (!this.tasks.delete(customerId, id)) {
      throw new NotFoundError('Task', id);
    }
    log.info({ customerId, taskId: id }, 'Task deleted');
  }

  private assertCustomer(customerId: string): void {
    if (!this.customers.exists(customerId)) {
      throw new NotFoundError('Customer', customerId);
    }
  }
}
