// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import type { ResultSetHeader, RowDataPacket } from "mysql2";
import type { Pool, PoolConnection } from "mysql2/promise";
import { z } from "zod";
import {
  ProductNameConflictError,
  type CustomerListFilters,
  type CustomersRepository,
  type ProductListFilters,
  type ProductsRepository
} from "@vinstock/modules-catalog";
import type {
  InventoryListFilters,
  InventoryRepository,
  MovementListFilters,
  NewInventoryRecord
} from "@vinstock/modules-inventory";
import type { SaleListFilters, SalesRepository } from "@vinstock/modules-sales";
import {
  MovementTypeSchema,
  SaleItemSchema,
  SaleStatusSchema,
  UnitOfMeasureSchema,
  type AuditLogEntryRequest,
  type Customer,
  type InventoryMovement,
  type InventoryRecord,
  type Product,
  type Sale
} from "@vinstock/shared";

type QueryExecutor = {
  execute: PoolConnection["execute"];
};

type SqlValue = string | number | null;

type ProductRow = RowDataPacket & {
  id: string;
  name: string;
  description: string | null;
  price: string | number;
  unit_of_measure: string;
  created_at: Date;
  updated_at: Date;
};

type CustomerRow = RowDataPacket & {
  id: string;
  name: string;
  email: string;
  phone: string;
  created_at: Date;
  updated_at: Date;
};

type InventoryRow = RowDataPacket & {
  id: string;
  product_id: string;
  product_name: string;
  product_description: string | null;
  unit_of_measure: string;
  quantity: number;
  last_update: Date;
};

type MovementRow = RowDataPacket & {
  id: string;
  product_id: string;
  product_name: string;
  quantity: number;
  movement_type: string;
  related_id: string | null;
  created_at: Date;
};

type SaleRow = RowDataPacket & {
  id: string;
  status: string;
  customer_id: string;
  customer_name: string | null;
  sale_date: Date | string;
  total_amount: string | number;
  items_json: unknown;
  created_at: Date;
  updated_at: Date;
};

type CountRow = RowDataPacket & {
  total: number | string;
};

const mysqlDuplicateErrorCode = 1062;

const SaleItemsSchema = z.array(SaleItemSchema);

function isMysqlError(error: unknown): error is { errno?: number } {
  return typeof error === "object" && error !== null && "errno" in error;
}

function toMysqlDateTime(value: string): string {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error("Invalid datetime");
  }

  return date.toISOString().slice(0, 23).replace("T", " ");
}

function toIsoString(value: Date | string): string {
  return new Date(value).toISOString();
}

function formatDateOnly(value: Date | string): string {
  if (typeof value === "string") {
    return value;
  }

  return value.toISOString().slice(0, 10);
}

function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (match) => `\\${match}`)}%`;
}

function normalizeProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: Number(row.price),
    unit_of_measure: UnitOfMeasureSchema.parse(row.unit_of_measure),
    created_at: toIsoString(row.created_at),
    updated_at: toIsoString(row.updated_at)
  };
}

function normalizeCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    created_at: toIsoString(row.created_at),
    updated_at: toIsoString(row.updated_at)
  };
}

function normalizeInventory(row: InventoryRow): InventoryRecord {
  return {
    id: row.id,
    product_id: row.product_id,
    product_name: row.product_name,
    product_description: row.product_description,
    unit_of_measure: UnitOfMeasureSchema.parse(row.unit_of_measure),
    quantity: Number(row.quantity),
    last_update: toIsoString(row.last_update)
  };
}

function normalizeMovement(row: MovementRow): InventoryMovement {
  return {
    id: row.id,
    product_id: row.product_id,
    product_name: row.product_name,
    quantity: Number(row.quantity),
    movement_type: MovementTypeSchema.parse(row.movement_type),
    related_id: row.related_id,
    created_at: toIsoString(row.created_at)
  };
}

function normalizeSale(row: SaleRow): Sale {
  // MySQL returns JSON columns parsed; MariaDB stores them as LONGTEXT
  const items = typeof row.items_json === "string" ? JSON.parse(row.items_json) : row.items_json;

  return {
    id: row.id,
    status: SaleStatusSchema.parse(row.status),
    customer_id: row.customer_id,
    customer_name: row.customer_name,
    sale_date: formatDateOnly(row.sale_date),
    total_amount: Number(row.total_amount),
    items: SaleItemsSchema.parse(items),
    created_at: toIsoString(row.created_at),
    updated_at: toIsoString(row.updated_at)
  };
}

const PRODUCT_COLUMNS = `id, name, description, price, unit_of_measure, created_at, updated_at`;

const INVENTORY_SELECT = `
  SELECT i.id, i.product_id, p.name AS product_name, p.description AS product_description,
         p.unit_of_measure, i.quantity, i.last_update
  FROM inventory i
  INNER JOIN products p ON p.id = i.product_id`;

const MOVEMENT_COLUMNS = `id, product_id, product_name, quantity, movement_type, related_id, created_at`;

const SALE_SELECT = `
  SELECT s.id, s.status, s.customer_id, c.name AS customer_name, s.sale_date, s.total_amount,
         s.items_json, s.created_at, s.updated_at
  FROM sales s
  LEFT JOIN customers c ON c.id = s.customer_id`;

/**
 * MySQL implementation of every repository the services use. Create one
 * per request: between begin() and commit()/rollback() all statements run
 * on a single pooled connection.
 */
export class MySqlStockStore
  implements ProductsRepository, CustomersRepository, InventoryRepository, SalesRepository
{
  private connection: PoolConnection | null = null;

  constructor(private readonly pool: Pool) {}

  async begin(): Promise<void> {
    if (this.connection) {
      throw new Error("Transaction already in progress");
    }
    this.connection = await this.pool.getConnection();
    await this.connection.beginTransaction();
  }

  async commit(): Promise<void> {
    if (!this.connection) {
      throw new Error("No transaction in progress");
    }
    try {
      await this.connection.commit();
    } finally {
      this.connection.release();
      this.connection = null;
    }
  }

  async rollback(): Promise<void> {
    if (!this.connection) {
      throw new Error("No transaction in progress");
    }
    try {
      await this.connection.rollback();
    } finally {
      this.connection.release();
      this.connection = null;
    }
  }

  // --- audit

  async insertAuditLog(entry: AuditLogEntryRequest): Promise<void> {
    await this.executor().execute<ResultSetHeader>(
      `INSERT INTO audit_logs (
         entity_type, entity_id, action, result, correlation_id, payload_json, changes_json, created_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, NOW(3))`,
      [
        entry.entity_type,
        entry.entity_id,
        entry.action,
        entry.result,
        entry.correlation_id ?? null,
        JSON.stringify(entry.payload ?? {}),
        entry.changes ? JSON.stringify(entry.changes) : null
      ]
    );
  }

  // --- products

  async listProducts(filters: ProductListFilters): Promise<{ total: number; products: Product[] }> {
    const conditions: string[] = [];
    const values: SqlValue[] = [];

    if (filters.query) {
      conditions.push("(name LIKE ? OR description LIKE ?)");
      values.push(likePattern(filters.query), likePattern(filters.query));
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const total = await this.count(`SELECT COUNT(*) AS total FROM products ${where}`, values);
    const [rows] = await this.executor().execute<ProductRow[]>(
      `SELECT ${PRODUCT_COLUMNS}
       FROM products
       ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT ? OFFSET ?`,
      [...values, String(filters.limit), String(filters.offset)]
    );

    return { total, products: rows.map(normalizeProduct) };
  }

  async findProductById(productId: string): Promise<Product | null> {
    const [rows] = await this.executor().execute<ProductRow[]>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ? LIMIT 1`,
      [productId]
    );

    return rows[0] ? normalizeProduct(rows[0]) : null;
  }

  async findProductsByIds(productIds: readonly string[]): Promise<Product[]> {
    if (productIds.length === 0) {
      return [];
    }

    const placeholders = productIds.map(() => "?").join(", ");
    const [rows] = await this.executor().execute<ProductRow[]>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id IN (${placeholders})`,
      [...productIds]
    );

    return rows.map(normalizeProduct);
  }

  async findProductByName(name: string): Promise<Product | null> {
    const [rows] = await this.executor().execute<ProductRow[]>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE name = ? LIMIT 1`,
      [name]
    );

    return rows[0] ? normalizeProduct(rows[0]) : null;
  }

  async insertProduct(product: Product): Promise<void> {
    try {
      await this.executor().execute<ResultSetHeader>(
        `INSERT INTO products (id, name, description, price, unit_of_measure, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          product.id,
          product.name,
          product.description,
          product.price,
          product.unit_of_measure,
          toMysqlDateTime(product.created_at),
          toMysqlDateTime(product.updated_at)
        ]
      );
    } catch (error) {
      if (isMysqlError(error) && error.errno === mysqlDuplicateErrorCode) {
        throw new ProductNameConflictError(product.name);
      }

      throw error;
    }
  }

  async updateProduct(product: Product): Promise<void> {
    try {
      await this.executor().execute<ResultSetHeader>(
        `UPDATE products
         SET name = ?, description = ?, price = ?, unit_of_measure = ?, updated_at = ?
         WHERE id = ?`,
        [
          product.name,
          product.description,
          product.price,
          product.unit_of_measure,
          toMysqlDateTime(product.updated_at),
          product.id
        ]
      );
    } catch (error) {
      if (isMysqlError(error) && error.errno === mysqlDuplicateErrorCode) {
        throw new ProductNameConflictError(product.name);
      }

      throw error;
    }
  }

  /**
   * The inventory row goes with the product (ON DELETE CASCADE).
   */
  async deleteProduct(productId: string): Promise<boolean> {
    const [result] = await this.executor().execute<ResultSetHeader>(
      `DELETE FROM products WHERE id = ?`,
      [productId]
    );

    return result.affectedRows > 0;
  }

  // --- customers

  async listCustomers(filters: CustomerListFilters): Promise<{ total: number; customers: Customer[] }> {
    const conditions: string[] = [];
    const values: SqlValue[] = [];

    if (filters.query) {
      conditions.push("(name LIKE ? OR email LIKE ?)");
      values.push(likePattern(filters.query), likePattern(filters.query));
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const total = await this.count(`SELECT COUNT(*) AS total FROM customers ${where}`, values);
    const [rows] = await this.executor().execute<CustomerRow[]>(
      `SELECT id, name, email, phone, created_at, updated_at
       FROM customers
       ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT ? OFFSET ?`,
      [...values, String(filters.limit), String(filters.offset)]
    );

    return { total, customers: rows.map(normalizeCustomer) };
  }

  async findCustomerById(customerId: string): Promise<Customer | null> {
    const [rows] = await this.executor().execute<CustomerRow[]>(
      `SELECT id, name, email, phone, created_at, updated_at FROM customers WHERE id = ? LIMIT 1`,
      [customerId]
    );

    return rows[0] ? normalizeCustomer(rows[0]) : null;
  }

  async insertCustomer(customer: Customer): Promise<void> {
    await this.executor().execute<ResultSetHeader>(
      `INSERT INTO customers (id, name, email, phone, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        customer.id,
        customer.name,
        customer.email,
        customer.phone,
        toMysqlDateTime(customer.created_at),
        toMysqlDateTime(customer.updated_at)
      ]
    );
  }

  async updateCustomer(customer: Customer): Promise<void> {
    await this.executor().execute<ResultSetHeader>(
      `UPDATE customers SET name = ?, email = ?, phone = ?, updated_at = ? WHERE id = ?`,
      [customer.name, customer.email, customer.phone, toMysqlDateTime(customer.updated_at), customer.id]
    );
  }

  async deleteCustomer(customerId: string): Promise<boolean> {
    const [result] = await this.executor().execute<ResultSetHeader>(
      `DELETE FROM customers WHERE id = ?`,
      [customerId]
    );

    return result.affectedRows > 0;
  }

  async countSalesByCustomer(customerId: string): Promise<number> {
    return this.count(`SELECT COUNT(*) AS total FROM sales WHERE customer_id = ?`, [customerId]);
  }

  // --- inventory

  async insertInventoryRecord(record: NewInventoryRecord): Promise<void> {
    const at = toMysqlDateTime(record.last_update);
    await this.executor().execute<ResultSetHeader>(
      `INSERT INTO inventory (id, product_id, quantity, last_update, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [record.id, record.product_id, record.quantity, at, at, at]
    );
  }

  async findInventoryByProductId(productId: string): Promise<InventoryRecord | null> {
    const [rows] = await this.executor().execute<InventoryRow[]>(
      `${INVENTORY_SELECT}
       WHERE i.product_id = ?
       LIMIT 1`,
      [productId]
    );

    return rows[0] ? normalizeInventory(rows[0]) : null;
  }

  async listInventory(filters: InventoryListFilters): Promise<{ total: number; inventory: InventoryRecord[] }> {
    const conditions: string[] = [];
    const values: SqlValue[] = [];

    if (filters.query) {
      conditions.push("(p.name LIKE ? OR p.description LIKE ?)");
      values.push(likePattern(filters.query), likePattern(filters.query));
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const total = await this.count(
      `SELECT COUNT(*) AS total
       FROM inventory i
       INNER JOIN products p ON p.id = i.product_id
       ${where}`,
      values
    );
    const [rows] = await this.executor().execute<InventoryRow[]>(
      `${INVENTORY_SELECT}
       ${where}
       ORDER BY i.created_at DESC, i.id DESC
       LIMIT ? OFFSET ?`,
      [...values, String(filters.limit), String(filters.offset)]
    );

    return { total, inventory: rows.map(normalizeInventory) };
  }

  /**
   * Relative update: concurrent deltas on the same product add up instead
   * of overwriting each other.
   */
  async adjustInventoryQuantity(productId: string, delta: number, at: string): Promise<number | null> {
    const timestamp = toMysqlDateTime(at);
    const [result] = await this.executor().execute<ResultSetHeader>(
      `UPDATE inventory
       SET quantity = quantity + ?, last_update = ?, updated_at = ?
       WHERE product_id = ?`,
      [delta, timestamp, timestamp, productId]
    );

    if (result.affectedRows === 0) {
      return null;
    }

    const [rows] = await this.executor().execute<InventoryRow[]>(
      `SELECT quantity FROM inventory WHERE product_id = ? LIMIT 1`,
      [productId]
    );

    return rows[0] ? Number(rows[0].quantity) : null;
  }

  async insertMovement(movement: InventoryMovement): Promise<void> {
    await this.executor().execute<ResultSetHeader>(
      `INSERT INTO inventory_movements (
         id, product_id, product_name, quantity, movement_type, related_id, created_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        movement.id,
        movement.product_id,
        movement.product_name,
        movement.quantity,
        movement.movement_type,
        movement.related_id,
        toMysqlDateTime(movement.created_at)
      ]
    );
  }

  async findMovementById(movementId: string): Promise<InventoryMovement | null> {
    const [rows] = await this.executor().execute<MovementRow[]>(
      `SELECT ${MOVEMENT_COLUMNS} FROM inventory_movements WHERE id = ? LIMIT 1`,
      [movementId]
    );

    return rows[0] ? normalizeMovement(rows[0]) : null;
  }

  async listMovements(filters: MovementListFilters): Promise<{ total: number; movements: InventoryMovement[] }> {
    const conditions: string[] = [];
    const values: SqlValue[] = [];

    if (filters.query) {
      conditions.push("product_name LIKE ?");
      values.push(likePattern(filters.query));
    }

    if (filters.product_id) {
      conditions.push("product_id = ?");
      values.push(filters.product_id);
    }

    if (filters.movement_type) {
      conditions.push("movement_type = ?");
      values.push(filters.movement_type);
    }

    if (filters.related_id) {
      conditions.push("related_id = ?");
      values.push(filters.related_id);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const total = await this.count(`SELECT COUNT(*) AS total FROM inventory_movements ${where}`, values);
    const [rows] = await this.executor().execute<MovementRow[]>(
      `SELECT ${MOVEMENT_COLUMNS}
       FROM inventory_movements
       ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT ? OFFSET ?`,
      [...values, String(filters.limit), String(filters.offset)]
    );

    return { total, movements: rows.map(normalizeMovement) };
  }

  async listMovementsByRelatedId(relatedId: string): Promise<InventoryMovement[]> {
    const [rows] = await this.executor().execute<MovementRow[]>(
      `SELECT ${MOVEMENT_COLUMNS}
       FROM inventory_movements
       WHERE related_id = ?
       ORDER BY created_at ASC, id ASC`,
      [relatedId]
    );

    return rows.map(normalizeMovement);
  }

  async deleteMovement(movementId: string): Promise<boolean> {
    const [result] = await this.executor().execute<ResultSetHeader>(
      `DELETE FROM inventory_movements WHERE id = ?`,
      [movementId]
    );

    return result.affectedRows > 0;
  }

  // --- sales

  async insertSale(sale: Sale): Promise<void> {
    await this.executor().execute<ResultSetHeader>(
      `INSERT INTO sales (
         id, status, customer_id, sale_date, total_amount, items_json, created_at, updated_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        sale.id,
        sale.status,
        sale.customer_id,
        sale.sale_date,
        sale.total_amount,
        JSON.stringify(sale.items),
        toMysqlDateTime(sale.created_at),
        toMysqlDateTime(sale.updated_at)
      ]
    );
  }

  async findSaleById(saleId: string, options?: { forUpdate?: boolean }): Promise<Sale | null> {
    const forUpdateClause = options?.forUpdate && this.connection ? " FOR UPDATE" : "";
    const [rows] = await this.executor().execute<SaleRow[]>(
      `${SALE_SELECT}
       WHERE s.id = ?
       LIMIT 1${forUpdateClause}`,
      [saleId]
    );

    return rows[0] ? normalizeSale(rows[0]) : null;
  }

  async listSales(filters: SaleListFilters): Promise<{ total: number; sales: Sale[] }> {
    const conditions: string[] = [];
    const values: SqlValue[] = [];

    if (filters.query) {
      conditions.push("c.name LIKE ?");
      values.push(likePattern(filters.query));
    }

    if (filters.status) {
      conditions.push("s.status = ?");
      values.push(filters.status);
    }

    if (filters.customer_id) {
      conditions.push("s.customer_id = ?");
      values.push(filters.customer_id);
    }

    if (filters.date_from) {
      conditions.push("s.sale_date >= ?");
      values.push(filters.date_from);
    }

    if (filters.date_to) {
      conditions.push("s.sale_date <= ?");
      values.push(filters.date_to);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const total = await this.count(
      `SELECT COUNT(*) AS total
       FROM sales s
       LEFT JOIN customers c ON c.id = s.customer_id
       ${where}`,
      values
    );
    const [rows] = await this.executor().execute<SaleRow[]>(
      `${SALE_SELECT}
       ${where}
       ORDER BY s.created_at DESC, s.id DESC
       LIMIT ? OFFSET ?`,
      [...values, String(filters.limit), String(filters.offset)]
    );

    return { total, sales: rows.map(normalizeSale) };
  }

  async updateSale(sale: Sale): Promise<void> {
    await this.executor().execute<ResultSetHeader>(
      `UPDATE sales
       SET status = ?, customer_id = ?, sale_date = ?, total_amount = ?, items_json = ?, updated_at = ?
       WHERE id = ?`,
      [
        sale.status,
        sale.customer_id,
        sale.sale_date,
        sale.total_amount,
        JSON.stringify(sale.items),
        toMysqlDateTime(sale.updated_at),
        sale.id
      ]
    );
  }

  async deleteSale(saleId: string): Promise<boolean> {
    const [result] = await this.executor().execute<ResultSetHeader>(
      `DELETE FROM sales WHERE id = ?`,
      [saleId]
    );

    return result.affectedRows > 0;
  }

  private executor(): QueryExecutor {
    return this.connection ?? this.pool;
  }

  private async count(sql: string, values: readonly SqlValue[]): Promise<number> {
    const [rows] = await this.executor().execute<CountRow[]>(sql, [...values]);
    return Number(rows[0]?.total ?? 0);
  }
}
