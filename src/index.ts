export { bootstrap } from "./bootstrap";
export { buildContainer, type AppContainer } from "./config/container";
export { loadConfig, loadDotenv, type AppConfig } from "./config/env";
export { createLogger, type AppLogger, type LogLevel } from "./config/logger";

export { Category, CATEGORIES, decodeCategory } from "./core/domain/entities/Category";
export {
  Product,
  type ProductInit,
  type ProductProps,
  type SerializedProduct,
} from "./core/domain/entities/Product";
export { DataValidationError } from "./core/domain/errors/DataValidationError";
export type {
  ProductFilter,
  ProductQuery,
  ProductRepository,
} from "./core/domain/repositories/ProductRepository";
export * from "./core/usecases/products";

export { ProductRepoSQLite } from "./infrastructure/persistence/sqlite/ProductRepoSQLite";
export { ProductQuerySQLite } from "./infrastructure/persistence/sqlite/ProductQuerySQLite";
export { SQLiteClient } from "./infrastructure/persistence/sqlite/SQLiteClient";

export { Price, parsePriceQuery, type PriceInput } from "./utils/price";
