import { DataValidationError } from '../../errors/DataValidationError';
import { CATEGORIES, Category, decodeCategory } from '../Category';

describe('decodeCategory', () => {
  it('decodifica por nombre exacto del miembro', () => {
    expect(decodeCategory('FOOD')).toBe(Category.FOOD);
    expect(decodeCategory('UNKNOWN')).toBe(Category.UNKNOWN);
  });

  it('el conjunto es cerrado', () => {
    expect(CATEGORIES).toEqual(['UNKNOWN', 'CLOTHS', 'FOOD', 'HOUSEWARES', 'AUTOMOTIVE', 'TOOLS']);
  });

  it('rechaza nombres desconocidos o con otro casing', () => {
    expect(() => decodeCategory('INVALID')).toThrow(
      'Atributo inválido: categoría desconocida [INVALID]'
    );
    expect(() => decodeCategory('food')).toThrow(DataValidationError);
    expect(() => decodeCategory(3)).toThrow('Atributo inválido: categoría desconocida [3]');
  });
});
