import { findBrand } from './product-attributes';

describe('findBrand', () => {
  it('matches brand synonyms case-insensitively', () => {
    expect(findBrand({ Marca: 'Acme' })).toBe('Acme');
    expect(findBrand({ BRAND: ' Acme ' })).toBe('Acme');
    expect(findBrand({ Manufacturer: '' })).toBeNull();
    expect(findBrand({ color: 'Negro' })).toBeNull();
    expect(findBrand(null)).toBeNull();
  });
});
