import { Product } from "../../domain/entities/Product";
import { ProductRepository } from "../../domain/repositories/ProductRepository";

export class GetProductById {
  constructor(private repo: ProductRepository) {}
  // null si no existe; nunca lanza por "no encontrado"
  execute(id: string): Promise<Product | null> {
    return this.repo.find(id);
  }
}
