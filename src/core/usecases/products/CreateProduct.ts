import { Product } from "../../domain/entities/Product";
import { ProductRepository } from "../../domain/repositories/ProductRepository";

export class CreateProduct {
  constructor(private repo: ProductRepository) {}

  /** Valida el payload (DataValidationError si algo falla) y lo persiste. */
  async execute(payload: unknown): Promise<Product> {
    const product = new Product().deserialize(payload);
    return this.repo.create(product);
  }
}
