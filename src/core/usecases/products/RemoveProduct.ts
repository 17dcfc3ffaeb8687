import { ProductRepository } from "../../domain/repositories/ProductRepository";

export class RemoveProduct {
  constructor(private repo: ProductRepository) {}

  /** true si había un producto con ese id */
  async execute(id: string): Promise<boolean> {
    const product = await this.repo.find(id);
    if (!product) return false;
    await this.repo.delete(product);
    return true;
  }
}
