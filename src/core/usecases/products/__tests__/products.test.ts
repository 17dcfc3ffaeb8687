import { createLogger } from '../../../../config/logger';
import { SQLiteClient } from '../../../../infrastructure/persistence/sqlite/SQLiteClient';
import { ProductRepoSQLite } from '../../../../infrastructure/persistence/sqlite/ProductRepoSQLite';
import { Category } from '../../../domain/entities/Category';
import { DataValidationError } from '../../../domain/errors/DataValidationError';
import {
  CreateProduct,
  GetAllProducts,
  GetProductById,
  ListProducts,
  RemoveProduct,
  UpdateProduct,
} from '..';

const payload = (overrides: Record<string, unknown> = {}) => ({
  name: 'Fedora',
  description: 'A red hat',
  price: '12.50',
  available: true,
  category: 'CLOTHS',
  ...overrides,
});

describe('casos de uso de productos', () => {
  let client: SQLiteClient;
  let repo: ProductRepoSQLite;
  const logger = createLogger('silent');

  beforeEach(() => {
    client = new SQLiteClient(':memory:').init();
    repo = new ProductRepoSQLite(client, logger);
  });

  afterEach(() => {
    client.close();
  });

  describe('CreateProduct', () => {
    it('valida y persiste el payload', async () => {
      const created = await new CreateProduct(repo).execute(payload());
      expect(created.id).not.toBeNull();

      const found = await new GetProductById(repo).execute(created.id ?? '');
      expect(found?.serialize()).toEqual({
        id: created.id,
        name: 'Fedora',
        description: 'A red hat',
        price: '12.50',
        available: true,
        category: 'CLOTHS',
      });
    });

    it('no persiste nada si el payload es inválido', async () => {
      await expect(
        new CreateProduct(repo).execute(payload({ available: 'yes' }))
      ).rejects.toThrow(DataValidationError);
      expect(await new GetAllProducts(repo).execute()).toEqual([]);
    });
  });

  describe('UpdateProduct', () => {
    it('aplica el payload y conserva el id guardado', async () => {
      const created = await new CreateProduct(repo).execute(payload());
      const id = created.id ?? '';

      const updated = await new UpdateProduct(repo).execute(
        id,
        payload({ id: 'OTRO', name: 'Nuevo', price: 5, available: false, category: 'TOOLS' })
      );
      expect(updated?.id).toBe(id);

      const found = await repo.find(id);
      expect(found?.name).toBe('Nuevo');
      expect(found?.price.toString()).toBe('5.00');
      expect(found?.available).toBe(false);
      expect(found?.category).toBe(Category.TOOLS);
      expect(await repo.all()).toHaveLength(1);
    });

    it('devuelve null si el id no existe', async () => {
      await expect(new UpdateProduct(repo).execute('NOEXISTE', payload())).resolves.toBeNull();
    });

    it('con payload inválido no toca la fila guardada', async () => {
      const created = await new CreateProduct(repo).execute(payload());
      const id = created.id ?? '';

      await expect(
        new UpdateProduct(repo).execute(id, payload({ category: 'INVALID' }))
      ).rejects.toThrow(DataValidationError);
      expect((await repo.find(id))?.category).toBe(Category.CLOTHS);
    });
  });

  describe('RemoveProduct', () => {
    it('devuelve true si borró y false si no había nada', async () => {
      const created = await new CreateProduct(repo).execute(payload());
      const remove = new RemoveProduct(repo);

      await expect(remove.execute(created.id ?? '')).resolves.toBe(true);
      await expect(remove.execute(created.id ?? '')).resolves.toBe(false);
      expect(await repo.all()).toEqual([]);
    });
  });

  describe('ListProducts', () => {
    const seed = async () => {
      const create = new CreateProduct(repo);
      await create.execute(payload({ name: 'Hat', category: 'CLOTHS', available: true, price: '2.50' }));
      await create.execute(payload({ name: 'Hat', category: 'FOOD', available: false }));
      await create.execute(payload({ name: 'Apple', category: 'FOOD', available: true }));
    };

    it('sin filtros devuelve todo', async () => {
      await seed();
      const list = new ListProducts(repo, logger);
      expect(await list.execute()).toHaveLength(3);
      expect(await list.execute({ name: '  ' })).toHaveLength(3);
    });

    it('category no distingue mayúsculas', async () => {
      await seed();
      const found = await new ListProducts(repo, logger).execute({ category: 'food' });
      expect(found.map((p) => p.name)).toEqual(['Hat', 'Apple']);
    });

    it('available interpreta "true" / "yes" / "1" y el resto es false', async () => {
      await seed();
      const list = new ListProducts(repo, logger);
      expect((await list.execute({ available: 'yes' })).map((p) => p.name)).toEqual(['Hat', 'Apple']);
      expect((await list.execute({ available: '1' })).map((p) => p.name)).toEqual(['Hat', 'Apple']);
      expect((await list.execute({ available: 'no' })).map((p) => p.category)).toEqual([Category.FOOD]);
      expect(await list.execute({ available: false })).toHaveLength(1);
    });

    it('combina filtros', async () => {
      await seed();
      const found = await new ListProducts(repo, logger).execute({ name: 'Hat', category: 'FOOD' });
      expect(found).toHaveLength(1);
      expect(found[0].available).toBe(false);
    });

    it('filtra por precio', async () => {
      await seed();
      const found = await new ListProducts(repo, logger).execute({ price: '"2.50"' });
      expect(found.map((p) => p.category)).toEqual([Category.CLOTHS]);
    });

    it('categoría desconocida lanza DataValidationError', async () => {
      await expect(
        new ListProducts(repo, logger).execute({ category: 'nada' })
      ).rejects.toThrow(DataValidationError);
    });
  });
});
