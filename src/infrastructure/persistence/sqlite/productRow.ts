// src/infrastructure/persistence/sqlite/productRow.ts
import { decodeCategory } from "../../../core/domain/entities/Category";
import { Product } from "../../../core/domain/entities/Product";

// Fila tal cual sale del SELECT
export type ProductRow = {
  id: string;
  name: string;
  description: string;
  price: string;
  available: number;
  category: string;
  created_at: string | null;
  updated_at: string | null;
};

export const SELECT_BASE = `
  SELECT
    id,
    name,
    description,
    price,
    available,
    category,
    created_at,
    updated_at
  FROM products
`;

// Row -> Product de dominio
export const toDomain = (r: ProductRow): Product =>
  new Product({
    id: r.id,
    name: r.name,
    description: r.description,
    price: r.price,
    available: r.available === 1,
    category: decodeCategory(r.category),
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  });
