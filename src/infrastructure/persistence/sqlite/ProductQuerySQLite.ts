// src/infrastructure/persistence/sqlite/ProductQuerySQLite.ts
import type { Product } from "../../../core/domain/entities/Product";
import type {
  ProductFilter,
  ProductQuery,
} from "../../../core/domain/repositories/ProductRepository";
import { Price } from "../../../utils/price";
import { SELECT_BASE, toDomain, type ProductRow } from "./productRow";
import type { SQLiteClient, SqlParam } from "./SQLiteClient";

export type Condition = {
  column: "name" | "available" | "category" | "price";
  value: SqlParam;
};

const toConditions = (filter: ProductFilter): Condition[] => {
  const out: Condition[] = [];
  if (filter.name !== undefined) out.push({ column: "name", value: filter.name });
  if (filter.available !== undefined) {
    out.push({ column: "available", value: filter.available ? 1 : 0 });
  }
  if (filter.category !== undefined) {
    out.push({ column: "category", value: filter.category });
  }
  if (filter.price !== undefined) {
    // misma forma canónica con la que se guardó
    out.push({ column: "price", value: Price.parse(filter.price).toString() });
  }
  return out;
};

/**
 * Descripción diferida de un SELECT sobre products.
 * Es inmutable: filterBy() devuelve otra consulta con más condiciones.
 */
export class ProductQuerySQLite implements ProductQuery {
  constructor(
    private readonly client: SQLiteClient,
    private readonly conditions: readonly Condition[] = []
  ) {}

  static fromFilter(client: SQLiteClient, filter: ProductFilter = {}): ProductQuerySQLite {
    return new ProductQuerySQLite(client, toConditions(filter));
  }

  filterBy(filter: ProductFilter): ProductQuery {
    return new ProductQuerySQLite(this.client, [...this.conditions, ...toConditions(filter)]);
  }

  private where(): { sql: string; params: SqlParam[] } {
    if (this.conditions.length === 0) return { sql: "", params: [] };
    return {
      sql: ` WHERE ${this.conditions.map((c) => `${c.column}=?`).join(" AND ")}`,
      params: this.conditions.map((c) => c.value),
    };
  }

  // Cada recorrido relee la tabla; las filas se traen completas antes de
  // devolverlas para no dejar un cursor abierto que bloquee escrituras.
  *[Symbol.iterator](): Iterator<Product> {
    const { sql, params } = this.where();
    for (const row of this.client.all<ProductRow>(`${SELECT_BASE}${sql} ORDER BY rowid`, params)) {
      yield toDomain(row);
    }
  }

  count(): number {
    const { sql, params } = this.where();
    const r = this.client.one<{ c: number }>(`SELECT COUNT(1) AS c FROM products${sql}`, params);
    return r?.c ?? 0;
  }

  first(): Product | null {
    const { sql, params } = this.where();
    const r = this.client.one<ProductRow>(`${SELECT_BASE}${sql} ORDER BY rowid LIMIT 1`, params);
    return r ? toDomain(r) : null;
  }

  toArray(): Product[] {
    return Array.from(this);
  }
}
