// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { randomUUID } from "node:crypto";
import {
  ConflictError,
  NotFoundError,
  runInTransaction,
  type TransactionalRepository
} from "@vinstock/core";
import { AuditService, type AuditRepository } from "@vinstock/modules-platform";
import type {
  Customer,
  CustomerCreateRequest,
  CustomerListQuery,
  CustomerUpdateRequest
} from "@vinstock/shared";

const DEFAULT_LIST_LIMIT = 50;

export type CustomerListFilters = {
  query?: string;
  limit: number;
  offset: number;
};

export interface CustomersRepository extends TransactionalRepository, AuditRepository {
  listCustomers(filters: CustomerListFilters): Promise<{ total: number; customers: Customer[] }>;
  findCustomerById(customerId: string): Promise<Customer | null>;
  insertCustomer(customer: Customer): Promise<void>;
  updateCustomer(customer: Customer): Promise<void>;
  deleteCustomer(customerId: string): Promise<boolean>;
  countSalesByCustomer(customerId: string): Promise<number>;
}

export class CustomerNotFoundError extends NotFoundError {
  constructor(customerId: string) {
    super("Customer", customerId);
    this.name = "CustomerNotFoundError";
  }
}

export class CustomerInUseError extends ConflictError {
  constructor(customerId: string, saleCount: number) {
    super(`Customer ${customerId} has ${saleCount} sale(s) and cannot be deleted`);
    this.name = "CustomerInUseError";
  }
}

export class CustomersService {
  private readonly audit: AuditService;

  constructor(
    private readonly repository: CustomersRepository,
    audit?: AuditService
  ) {
    this.audit = audit ?? new AuditService(repository);
  }

  async listCustomers(query: Partial<CustomerListQuery> = {}): Promise<{ total: number; customers: Customer[] }> {
    return this.repository.listCustomers({
      query: query.query,
      limit: query.limit ?? DEFAULT_LIST_LIMIT,
      offset: query.offset ?? 0
    });
  }

  async getCustomer(customerId: string): Promise<Customer> {
    const customer = await this.repository.findCustomerById(customerId);
    if (!customer) {
      throw new CustomerNotFoundError(customerId);
    }

    return customer;
  }

  async createCustomer(input: CustomerCreateRequest): Promise<Customer> {
    return runInTransaction(this.repository, async () => {
      const now = new Date().toISOString();
      const customer: Customer = {
        id: randomUUID(),
        name: input.name,
        email: input.email,
        phone: input.phone,
        created_at: now,
        updated_at: now
      };

      await this.repository.insertCustomer(customer);
      await this.audit.logCreate("customer", customer.id, customer);

      return customer;
    });
  }

  async updateCustomer(customerId: string, input: CustomerUpdateRequest): Promise<Customer> {
    return runInTransaction(this.repository, async () => {
      const current = await this.getCustomer(customerId);
      const updated: Customer = {
        ...current,
        name: input.name ?? current.name,
        email: input.email ?? current.email,
        phone: input.phone ?? current.phone,
        updated_at: new Date().toISOString()
      };

      await this.repository.updateCustomer(updated);
      await this.audit.logUpdate("customer", customerId, current, updated);

      return updated;
    });
  }

  async deleteCustomer(customerId: string): Promise<void> {
    await runInTransaction(this.repository, async () => {
      const current = await this.getCustomer(customerId);

      const saleCount = await this.repository.countSalesByCustomer(customerId);
      if (saleCount > 0) {
        throw new CustomerInUseError(customerId, saleCount);
      }

      await this.repository.deleteCustomer(customerId);
      await this.audit.logDelete("customer", customerId, current);
    });
  }
}
