// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { randomUUID } from "node:crypto";
import {
  canTransitionSale,
  findUnreversedSaleMovements,
  isTerminalSaleStatus,
  NotFoundError,
  runInTransaction,
  StateError,
  ValidationError,
  type FieldErrors,
  type PricedProduct,
  type TransactionalRepository
} from "@vinstock/core";
import {
  CustomerNotFoundError,
  type CustomersRepository,
  type ProductsRepository
} from "@vinstock/modules-catalog";
import type { InventoryService } from "@vinstock/modules-inventory";
import { AuditService, type AuditRepository } from "@vinstock/modules-platform";
import type {
  Sale,
  SaleCreateRequest,
  SaleListQuery,
  SaleStatus,
  SaleUpdateRequest
} from "@vinstock/shared";
import { buildSale } from "./sale-builder";

const DEFAULT_LIST_LIMIT = 5;

export type SaleListFilters = {
  query?: string;
  status?: SaleStatus;
  customer_id?: string;
  date_from?: string;
  date_to?: string;
  limit: number;
  offset: number;
};

/**
 * Persistence for sales. The instance handed to SalesService must be the
 * same one the InventoryService was built on, so movements share the sale's
 * transaction.
 */
export interface SalesRepository
  extends TransactionalRepository,
    AuditRepository,
    Pick<ProductsRepository, "findProductsByIds">,
    Pick<CustomersRepository, "findCustomerById"> {
  insertSale(sale: Sale): Promise<void>;
  findSaleById(saleId: string, options?: { forUpdate?: boolean }): Promise<Sale | null>;
  listSales(filters: SaleListFilters): Promise<{ total: number; sales: Sale[] }>;
  updateSale(sale: Sale): Promise<void>;
  deleteSale(saleId: string): Promise<boolean>;
}

export type SalesServiceOptions = {
  defaultListLimit?: number;
  audit?: AuditService;
};

export class SaleNotFoundError extends NotFoundError {
  constructor(saleId: string) {
    super("Sale", saleId);
    this.name = "SaleNotFoundError";
  }
}

export class SaleValidationError extends ValidationError {
  constructor(fieldErrors: FieldErrors) {
    super("Sale is invalid", fieldErrors);
    this.name = "SaleValidationError";
  }
}

export class SaleStatusError extends StateError {
  constructor(
    readonly saleId: string,
    readonly status: SaleStatus,
    message = "cannot modify a sale in this status"
  ) {
    super(message);
    this.name = "SaleStatusError";
  }
}

function todayDateOnly(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * SalesService
 * Sales ledger: every sale debits stock through sale movements when it is
 * created and credits it back through reversals when it is canceled, each
 * as a single atomic unit.
 */
export class SalesService {
  private readonly defaultListLimit: number;
  private readonly audit: AuditService;

  constructor(
    private readonly repository: SalesRepository,
    private readonly inventory: InventoryService,
    options: SalesServiceOptions = {}
  ) {
    this.defaultListLimit = options.defaultListLimit ?? DEFAULT_LIST_LIMIT;
    this.audit = options.audit ?? new AuditService(repository);
  }

  async listSales(query: Partial<SaleListQuery> = {}): Promise<{ total: number; sales: Sale[] }> {
    return this.repository.listSales({
      query: query.query,
      status: query.status,
      customer_id: query.customer_id,
      date_from: query.date_from,
      date_to: query.date_to,
      limit: query.limit ?? this.defaultListLimit,
      offset: query.offset ?? 0
    });
  }

  async listSalesByCustomer(
    customerId: string,
    query: Partial<SaleListQuery> = {}
  ): Promise<{ total: number; sales: Sale[] }> {
    const customer = await this.repository.findCustomerById(customerId);
    if (!customer) {
      throw new CustomerNotFoundError(customerId);
    }

    return this.listSales({ ...query, customer_id: customerId });
  }

  async getSale(saleId: string): Promise<Sale> {
    const sale = await this.repository.findSaleById(saleId);
    if (!sale) {
      throw new SaleNotFoundError(saleId);
    }

    return sale;
  }

  /**
   * Create a pending sale and debit stock for each of its lines.
   * Nothing is persisted unless every step succeeds.
   */
  async createSale(input: SaleCreateRequest): Promise<Sale> {
    return runInTransaction(this.repository, async () => {
      const [customer, products] = await Promise.all([
        input.customer_id ? this.repository.findCustomerById(input.customer_id) : Promise.resolve(null),
        this.findProducts(input)
      ]);

      const result = buildSale(input, { customerExists: customer !== null, products }, todayDateOnly());
      if (!result.ok) {
        throw new SaleValidationError(result.errors);
      }

      const now = new Date().toISOString();
      const sale: Sale = {
        id: randomUUID(),
        status: result.value.status,
        customer_id: result.value.customer_id,
        customer_name: customer?.name ?? null,
        sale_date: result.value.sale_date,
        total_amount: result.value.total_amount,
        items: [...result.value.items],
        created_at: now,
        updated_at: now
      };

      await this.repository.insertSale(sale);

      for (const item of sale.items) {
        await this.inventory.recordMovement(
          {
            product_id: item.product_id,
            quantity: item.quantity,
            movement_type: "sale",
            related_id: sale.id
          },
          { transactionOwner: "external" }
        );
      }

      await this.audit.logCreate("sale", sale.id, sale);

      return sale;
    });
  }

  /**
   * Status transitions and header edits. Moving to "canceled" reverses the
   * sale's stock movements in the same transaction as the status change.
   */
  async updateSale(saleId: string, input: SaleUpdateRequest): Promise<Sale> {
    if (input.status === "canceled") {
      return this.cancelSale(saleId, input);
    }

    return runInTransaction(this.repository, async () => {
      const current = await this.findSaleForUpdate(saleId);

      if (isTerminalSaleStatus(current.status)) {
        throw new SaleStatusError(saleId, current.status);
      }

      if (input.status !== undefined && !canTransitionSale(current.status, input.status)) {
        throw new SaleStatusError(
          saleId,
          current.status,
          `cannot change a sale from ${current.status} to ${input.status}`
        );
      }

      const customerName = await this.resolveCustomerName(current, input.customer_id);
      const updated: Sale = {
        ...current,
        status: input.status ?? current.status,
        customer_id: input.customer_id ?? current.customer_id,
        customer_name: customerName,
        sale_date: input.sale_date ?? current.sale_date,
        updated_at: new Date().toISOString()
      };

      await this.repository.updateSale(updated);
      await this.audit.logUpdate("sale", saleId, current, updated);

      return updated;
    });
  }

  /**
   * Only canceled sales can be removed: their stock has already been
   * credited back. The ledger keeps the sale's movements.
   */
  async deleteSale(saleId: string): Promise<void> {
    await runInTransaction(this.repository, async () => {
      const current = await this.findSaleForUpdate(saleId);
      if (current.status !== "canceled") {
        throw new SaleStatusError(saleId, current.status, "only canceled sales can be deleted");
      }

      await this.repository.deleteSale(saleId);
      await this.audit.logDelete("sale", saleId, current);
    });
  }

  private async cancelSale(saleId: string, input: SaleUpdateRequest): Promise<Sale> {
    return runInTransaction(this.repository, async () => {
      const current = await this.findSaleForUpdate(saleId);

      // already reversed; a second cancel changes nothing
      if (current.status === "canceled") {
        return current;
      }

      if (isTerminalSaleStatus(current.status)) {
        throw new SaleStatusError(saleId, current.status);
      }

      const movements = await this.inventory.listMovementsByRelatedId(saleId);
      const reversals: string[] = [];
      for (const movement of findUnreversedSaleMovements(movements)) {
        const reversal = await this.inventory.recordMovement(
          {
            product_id: movement.product_id,
            quantity: movement.quantity,
            movement_type: "sale_reversal",
            related_id: saleId
          },
          { transactionOwner: "external" }
        );
        reversals.push(reversal.id);
      }

      const customerName = await this.resolveCustomerName(current, input.customer_id);
      const updated: Sale = {
        ...current,
        status: "canceled",
        customer_id: input.customer_id ?? current.customer_id,
        customer_name: customerName,
        sale_date: input.sale_date ?? current.sale_date,
        updated_at: new Date().toISOString()
      };

      await this.repository.updateSale(updated);
      await this.audit.logAction("sale", saleId, "CANCEL", {
        previous_status: current.status,
        reversal_movement_ids: reversals
      });

      return updated;
    });
  }

  private async findSaleForUpdate(saleId: string): Promise<Sale> {
    const sale = await this.repository.findSaleById(saleId, { forUpdate: true });
    if (!sale) {
      throw new SaleNotFoundError(saleId);
    }

    return sale;
  }

  private async resolveCustomerName(current: Sale, customerId: string | undefined): Promise<string | null> {
    if (customerId === undefined || customerId === current.customer_id) {
      return current.customer_name;
    }

    const customer = await this.repository.findCustomerById(customerId);
    if (!customer) {
      throw new SaleValidationError({ customer_id: ["does not exist"] });
    }

    return customer.name;
  }

  private async findProducts(input: SaleCreateRequest): Promise<Map<string, PricedProduct>> {
    const productIds = [
      ...new Set(
        input.items
          .map((item) => item.product_id ?? "")
          .filter((productId) => productId.length > 0)
      )
    ];

    if (productIds.length === 0) {
      return new Map();
    }

    const products = await this.repository.findProductsByIds(productIds);
    return new Map(products.map((product) => [product.id, product]));
  }
}
