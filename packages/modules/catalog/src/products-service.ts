// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { randomUUID } from "node:crypto";
import {
  normalizeMoney,
  NotFoundError,
  runInTransaction,
  ValidationError,
  type TransactionalRepository
} from "@vinstock/core";
import { AuditService, type AuditRepository } from "@vinstock/modules-platform";
import type {
  Product,
  ProductCreateRequest,
  ProductListQuery,
  ProductUpdateRequest
} from "@vinstock/shared";

const DEFAULT_LIST_LIMIT = 50;

export type ProductListFilters = {
  query?: string;
  limit: number;
  offset: number;
};

/**
 * Persistence for products. Must support transactions so a product and its
 * inventory record are created together.
 */
export interface ProductsRepository extends TransactionalRepository, AuditRepository {
  listProducts(filters: ProductListFilters): Promise<{ total: number; products: Product[] }>;
  findProductById(productId: string): Promise<Product | null>;
  findProductsByIds(productIds: readonly string[]): Promise<Product[]>;
  findProductByName(name: string): Promise<Product | null>;
  insertProduct(product: Product): Promise<void>;
  updateProduct(product: Product): Promise<void>;
  deleteProduct(productId: string): Promise<boolean>;
}

/**
 * Called inside the product-creation transaction; the inventory ledger
 * implements it to open the product's stock record at zero.
 */
export interface InventoryInitializer {
  initializeInventory(productId: string, at: string): Promise<void>;
}

export class ProductNotFoundError extends NotFoundError {
  constructor(productId: string) {
    super("Product", productId);
    this.name = "ProductNotFoundError";
  }
}

export class ProductNameConflictError extends ValidationError {
  constructor(name: string) {
    super(`Product name '${name}' is already taken`, { name: ["has already been taken"] });
    this.name = "ProductNameConflictError";
  }
}

/**
 * ProductsService
 * Framework-agnostic business logic for the product catalog
 */
export class ProductsService {
  private readonly audit: AuditService;

  constructor(
    private readonly repository: ProductsRepository,
    private readonly inventory: InventoryInitializer,
    audit?: AuditService
  ) {
    this.audit = audit ?? new AuditService(repository);
  }

  async listProducts(query: Partial<ProductListQuery> = {}): Promise<{ total: number; products: Product[] }> {
    return this.repository.listProducts({
      query: query.query,
      limit: query.limit ?? DEFAULT_LIST_LIMIT,
      offset: query.offset ?? 0
    });
  }

  async getProduct(productId: string): Promise<Product> {
    const product = await this.repository.findProductById(productId);
    if (!product) {
      throw new ProductNotFoundError(productId);
    }

    return product;
  }

  /**
   * Create a product together with its empty inventory record
   */
  async createProduct(input: ProductCreateRequest): Promise<Product> {
    return runInTransaction(this.repository, async () => {
      await this.assertNameAvailable(input.name, null);

      const now = new Date().toISOString();
      const product: Product = {
        id: randomUUID(),
        name: input.name,
        description: input.description,
        price: normalizeMoney(input.price),
        unit_of_measure: input.unit_of_measure,
        created_at: now,
        updated_at: now
      };

      await this.repository.insertProduct(product);
      await this.inventory.initializeInventory(product.id, now);
      await this.audit.logCreate("product", product.id, product);

      return product;
    });
  }

  async updateProduct(productId: string, input: ProductUpdateRequest): Promise<Product> {
    return runInTransaction(this.repository, async () => {
      const current = await this.getProduct(productId);

      if (input.name !== undefined && input.name !== current.name) {
        await this.assertNameAvailable(input.name, productId);
      }

      const updated: Product = {
        ...current,
        name: input.name ?? current.name,
        description: input.description !== undefined ? input.description : current.description,
        price: input.price !== undefined ? normalizeMoney(input.price) : current.price,
        unit_of_measure: input.unit_of_measure ?? current.unit_of_measure,
        updated_at: new Date().toISOString()
      };

      await this.repository.updateProduct(updated);
      await this.audit.logUpdate("product", productId, current, updated);

      return updated;
    });
  }

  /**
   * Movements and sale lines keep their own name/price snapshots, so the
   * product can go without rewriting history.
   */
  async deleteProduct(productId: string): Promise<void> {
    await runInTransaction(this.repository, async () => {
      const current = await this.getProduct(productId);
      const removed = await this.repository.deleteProduct(productId);
      if (!removed) {
        throw new ProductNotFoundError(productId);
      }

      await this.audit.logDelete("product", productId, current);
    });
  }

  private async assertNameAvailable(name: string, productId: string | null): Promise<void> {
    const existing = await this.repository.findProductByName(name);
    if (existing && existing.id !== productId) {
      throw new ProductNameConflictError(name);
    }
  }
}
