import type { PriceInput } from "../../../utils/price";
import type { Category } from "../entities/Category";
import type { Product } from "../entities/Product";

/** Filtros exactos; varios campos se combinan con AND. */
export interface ProductFilter {
  name?: string;
  available?: boolean;
  category?: Category;
  price?: PriceInput;
}

/**
 * Consulta diferida: construirla no toca la DB.
 * Cada iteración / count() / toArray() vuelve a ejecutar el SELECT.
 */
export interface ProductQuery extends Iterable<Product> {
  filterBy(filter: ProductFilter): ProductQuery;
  count(): number;
  first(): Product | null;
  toArray(): Product[];
}

export interface ProductRepository {
  create(product: Product): Promise<Product>;
  update(product: Product): Promise<Product>;
  delete(product: Product): Promise<void>;

  all(): Promise<Product[]>;
  find(id: string): Promise<Product | null>;

  where(filter: ProductFilter): ProductQuery;
  findByName(name: string): ProductQuery;
  findByAvailability(available: boolean): ProductQuery;
  findByCategory(category: Category): ProductQuery;
  findByPrice(price: PriceInput): ProductQuery;
}
