// src/infrastructure/persistence/sqlite/ProductRepoSQLite.ts
import dayjs from "dayjs";
import { customAlphabet } from "nanoid/non-secure";
import type { AppLogger } from "../../../config/logger";
import type { Category } from "../../../core/domain/entities/Category";
import type { Product } from "../../../core/domain/entities/Product";
import { DataValidationError } from "../../../core/domain/errors/DataValidationError";
import type {
  ProductFilter,
  ProductQuery,
  ProductRepository,
} from "../../../core/domain/repositories/ProductRepository";
import { parsePriceQuery, type PriceInput } from "../../../utils/price";
import { SELECT_BASE, toDomain, type ProductRow } from "./productRow";
import { ProductQuerySQLite } from "./ProductQuerySQLite";
import type { SQLiteClient } from "./SQLiteClient";

const nano = customAlphabet("0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ", 16);

export class ProductRepoSQLite implements ProductRepository {
  constructor(
    private readonly client: SQLiteClient,
    private readonly logger: AppLogger
  ) {}

  /**
   * Inserta y asigna un id nuevo (si traía uno, se reemplaza).
   * Errores del store (constraint, conexión) se propagan tal cual.
   */
  async create(product: Product): Promise<Product> {
    this.logger.info({ name: product.name }, "[ProductRepoSQLite.create] creando producto");
    const id = nano();
    const now = dayjs().toISOString();

    this.client.run(
      `INSERT INTO products
         (id, name, description, price, available, category, created_at, updated_at)
       VALUES
         (?,  ?,    ?,           ?,     ?,         ?,        ?,          ?)`,
      [
        id,
        product.name,
        product.description,
        product.price.toString(),
        product.available ? 1 : 0,
        product.category,
        now,
        now,
      ]
    );

    product.id = id;
    product.createdAt = now;
    product.updatedAt = now;
    return product;
  }

  async update(product: Product): Promise<Product> {
    if (!product.id) {
      throw new DataValidationError("update llamado sin ID");
    }
    this.logger.info({ id: product.id }, "[ProductRepoSQLite.update] guardando producto");
    const now = dayjs().toISOString();

    const res = this.client.run(
      `UPDATE products
         SET name=?,
             description=?,
             price=?,
             available=?,
             category=?,
             updated_at=?
       WHERE id=?`,
      [
        product.name,
        product.description,
        product.price.toString(),
        product.available ? 1 : 0,
        product.category,
        now,
        product.id,
      ]
    );
    if (res.changes === 0) {
      this.logger.warn({ id: product.id }, "[ProductRepoSQLite.update] no existe fila con ese id");
    }

    product.updatedAt = now;
    return product;
  }

  /** Borra la fila; el objeto en memoria conserva su id. */
  async delete(product: Product): Promise<void> {
    if (!product.id) {
      throw new DataValidationError("delete llamado sin ID");
    }
    this.logger.info({ id: product.id }, "[ProductRepoSQLite.delete] borrando producto");
    this.client.run(`DELETE FROM products WHERE id=?`, [product.id]);
  }

  async all(): Promise<Product[]> {
    this.logger.debug("[ProductRepoSQLite.all]");
    return this.client.all<ProductRow>(`${SELECT_BASE} ORDER BY rowid`).map(toDomain);
  }

  async find(id: string): Promise<Product | null> {
    this.logger.debug({ id }, "[ProductRepoSQLite.find]");
    const r = this.client.one<ProductRow>(`${SELECT_BASE} WHERE id=?`, [id]);
    return r ? toDomain(r) : null;
  }

  where(filter: ProductFilter): ProductQuery {
    return ProductQuerySQLite.fromFilter(this.client, filter);
  }

  findByName(name: string): ProductQuery {
    this.logger.debug({ name }, "[ProductRepoSQLite.findByName]");
    return this.where({ name });
  }

  findByAvailability(available: boolean): ProductQuery {
    this.logger.debug({ available }, "[ProductRepoSQLite.findByAvailability]");
    return this.where({ available });
  }

  findByCategory(category: Category): ProductQuery {
    this.logger.debug({ category }, "[ProductRepoSQLite.findByCategory]");
    return this.where({ category });
  }

  findByPrice(price: PriceInput): ProductQuery {
    const value = parsePriceQuery(price);
    this.logger.debug({ price: value.toString() }, "[ProductRepoSQLite.findByPrice]");
    return this.where({ price: value });
  }
}
