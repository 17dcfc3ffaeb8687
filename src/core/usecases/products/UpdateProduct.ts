import { Product } from "../../domain/entities/Product";
import { ProductRepository } from "../../domain/repositories/ProductRepository";

export class UpdateProduct {
  constructor(private repo: ProductRepository) {}

  /**
   * Aplica el payload sobre el producto guardado. El id de la ruta manda:
   * un "id" dentro del payload se ignora. null si no existe.
   */
  async execute(id: string, payload: unknown): Promise<Product | null> {
    const product = await this.repo.find(id);
    if (!product) return null;

    product.deserialize(payload);
    return this.repo.update(product);
  }
}
