// src/core/domain/entities/Product.ts
import { Price, type PriceInput } from "../../../utils/price";
import {
  ProductPayloadSchema,
  toDataValidationError,
} from "../schemas/ProductPayloadSchema";
import { Category, decodeCategory } from "./Category";

export type UUID = string;

export interface ProductProps {
  id: UUID | null;             // null => nunca persistido
  name: string;
  description: string;
  price: Price;                // decimal exacto, nunca float
  available: boolean;
  category: Category;

  // los pone el repositorio; no viajan en el payload
  createdAt: string | null;    // ISO
  updatedAt: string | null;    // ISO
}

export type ProductInit = Partial<Omit<ProductProps, "price">> & {
  price?: PriceInput;
};

/** Payload plano que sale de serialize() */
export interface SerializedProduct {
  id: UUID | null;
  name: string;
  description: string;
  price: string;
  available: boolean;
  category: string;
}

export class Product implements ProductProps {
  id: UUID | null;
  name: string;
  description: string;
  price: Price;
  available: boolean;
  category: Category;
  createdAt: string | null;
  updatedAt: string | null;

  constructor(init: ProductInit = {}) {
    this.id = init.id ?? null;
    this.name = init.name ?? "";
    this.description = init.description ?? "";
    this.price = Price.parse(init.price ?? 0);
    this.available = init.available ?? false;
    this.category = init.category ?? Category.UNKNOWN;
    this.createdAt = init.createdAt ?? null;
    this.updatedAt = init.updatedAt ?? null;
  }

  serialize(): SerializedProduct {
    return {
      id: this.id,
      name: this.name,
      description: this.description,
      price: this.price.toString(),
      available: this.available,
      category: this.category,
    };
  }

  /**
   * Carga los campos desde un payload sin tipo y devuelve la misma instancia.
   * Cualquier problema sale como DataValidationError; si falla, la entidad
   * puede quedar a medio cargar y hay que descartarla.
   */
  deserialize(payload: unknown): this {
    const parsed = ProductPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw toDataValidationError(parsed.error, payload);
    }
    const data = parsed.data;

    this.name = data.name;
    this.description = data.description ?? "";
    this.price = Price.parse(data.price);
    this.available = data.available;
    this.category = decodeCategory(data.category);
    return this;
  }

  toString(): string {
    return `<Product ${this.name} id=[${this.id}]>`;
  }

  toJSON(): SerializedProduct {
    return this.serialize();
  }
}
