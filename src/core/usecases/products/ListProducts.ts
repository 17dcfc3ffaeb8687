import type { AppLogger } from "../../../config/logger";
import { parsePriceQuery } from "../../../utils/price";
import { decodeCategory } from "../../domain/entities/Category";
import { Product } from "../../domain/entities/Product";
import {
  ProductFilter,
  ProductRepository,
} from "../../domain/repositories/ProductRepository";

/** Parámetros tal como llegarían en un query string */
export type ListProductsQuery = {
  name?: string;
  category?: string;
  available?: string | boolean;
  price?: string | number;
};

const TRUTHY = ["true", "yes", "1"];

const hasValue = <T>(v: T | undefined): v is T =>
  v !== undefined && (typeof v !== "string" || v.trim() !== "");

export class ListProducts {
  constructor(private repo: ProductRepository, private logger: AppLogger) {}

  async execute(query: ListProductsQuery = {}): Promise<Product[]> {
    const filters: ProductFilter[] = [];

    if (hasValue(query.name)) filters.push({ name: query.name });
    if (hasValue(query.category)) {
      filters.push({ category: decodeCategory(query.category.trim().toUpperCase()) });
    }
    if (hasValue(query.available)) {
      const available =
        typeof query.available === "boolean"
          ? query.available
          : TRUTHY.includes(query.available.trim().toLowerCase());
      filters.push({ available });
    }
    if (hasValue(query.price)) filters.push({ price: parsePriceQuery(query.price) });

    if (filters.length === 0) {
      this.logger.debug("[ListProducts] sin filtros, devolviendo todo");
      return this.repo.all();
    }

    // se encadenan: cada filterBy agrega una condición AND
    const [head, ...rest] = filters;
    const q = rest.reduce((acc, f) => acc.filterBy(f), this.repo.where(head));
    this.logger.debug({ filters: filters.length }, "[ListProducts] consulta filtrada");
    return q.toArray();
  }
}
