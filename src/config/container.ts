// src/config/container.ts
import { ProductRepoSQLite } from "../infrastructure/persistence/sqlite/ProductRepoSQLite";
import { SQLiteClient } from "../infrastructure/persistence/sqlite/SQLiteClient";
import type { ProductRepository } from "../core/domain/repositories/ProductRepository";

import {
  CreateProduct,
  GetAllProducts,
  GetProductById,
  ListProducts,
  RemoveProduct,
  UpdateProduct,
} from "../core/usecases/products";

import type { AppConfig } from "./env";
import { createLogger, type AppLogger } from "./logger";

export type AppContainer = {
  config: AppConfig;
  logger: AppLogger;
  client: SQLiteClient;
  repos: {
    productRepo: ProductRepository;
  };
  usecases: {
    getAllProducts: GetAllProducts;
    getProductById: GetProductById;
    createProduct: CreateProduct;
    updateProduct: UpdateProduct;
    removeProduct: RemoveProduct;
    listProducts: ListProducts;

    // Aliases cómodos para la capa HTTP
    products: {
      list: ListProducts;
      get: GetProductById;
      create: CreateProduct;
      update: UpdateProduct;
      delete: RemoveProduct;
    };
  };
  /** Cierra la conexión; el contenedor no se puede reutilizar después. */
  dispose(): void;
};

/**
 * Arma el grafo de dependencias sobre un SQLiteClient propio.
 * Sin singleton: cada llamada abre su conexión y quien llama la cierra con dispose().
 */
export function buildContainer(
  config: AppConfig,
  logger: AppLogger = createLogger(config.logLevel, config.env)
): AppContainer {
  const client = new SQLiteClient(config.databaseUri, logger).init();
  const productRepo = new ProductRepoSQLite(client, logger);

  const getAllProducts = new GetAllProducts(productRepo);
  const getProductById = new GetProductById(productRepo);
  const createProduct  = new CreateProduct(productRepo);
  const updateProduct  = new UpdateProduct(productRepo);
  const removeProduct  = new RemoveProduct(productRepo);
  const listProducts   = new ListProducts(productRepo, logger);

  logger.info({ databaseUri: config.databaseUri }, "[container] listo");

  return {
    config,
    logger,
    client,
    repos: { productRepo },
    usecases: {
      getAllProducts,
      getProductById,
      createProduct,
      updateProduct,
      removeProduct,
      listProducts,
      products: {
        list:   listProducts,
        get:    getProductById,
        create: createProduct,
        update: updateProduct,
        delete: removeProduct,
      },
    },
    dispose: () => client.close(),
  };
}
