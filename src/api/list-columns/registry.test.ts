import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildColumnRegistry } from './registry.ts';
import { ConfigurationError } from './errors.ts';

describe('buildColumnRegistry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fills every default for a bare declaration', () => {
    const registry = buildColumnRegistry('product', { sku: {} });

    expect(registry.content_type).toBe('product');
    expect(registry.get('sku')).toEqual({
      key: 'sku',
      title: '',
      type: 'attribute',
      sortable: false,
      orderable_key: 'attribute_value',
      searchable: false,
      transform: null,
    });
  });

  it('keeps caller-supplied values over defaults', () => {
    const transform = (value: unknown) => `#${String(value)}`;
    const registry = buildColumnRegistry('product', {
      price: { title: 'Price', sortable: true, orderable_key: 'attribute_value_num', searchable: true, transform },
    });

    const price = registry.get('price');
    expect(price?.title).toBe('Price');
    expect(price?.sortable).toBe(true);
    expect(price?.orderable_key).toBe('attribute_value_num');
    expect(price?.searchable).toBe(true);
    expect(price?.transform).toBe(transform);
  });

  it('stores false and "removed" as removals without defaults', () => {
    const registry = buildColumnRegistry('product', { date: false, author: 'removed' });

    expect(registry.entries()).toEqual([
      { kind: 'removed', key: 'date' },
      { kind: 'removed', key: 'author' },
    ]);
    expect(registry.get('date')).toBeUndefined();
    expect(registry.isRemoved('author')).toBe(true);
    expect(registry.active()).toEqual([]);
  });

  it('applies thumbnail defaults before the general defaults', () => {
    const registry = buildColumnRegistry('product', { thumbnail: {} });

    expect(registry.get('thumbnail')).toEqual({
      key: 'thumbnail',
      title: 'Featured Image',
      type: 'thumbnail',
      width: 80,
      height: 80,
      sortable: false,
      orderable_key: 'attribute_value',
      searchable: false,
      transform: null,
    });
  });

  it('translates the thumbnail title and keeps caller sizes', () => {
    const registry = buildColumnRegistry('product', { thumbnail: { width: 40 } }, { translate: (text) => `[${text}]` });

    const thumbnail = registry.get('thumbnail');
    expect(thumbnail?.title).toBe('[Featured Image]');
    expect(thumbnail?.type === 'thumbnail' && thumbnail.width).toBe(40);
    expect(thumbnail?.type === 'thumbnail' && thumbnail.height).toBe(80);
  });

  it('forces the thumbnail type on the reserved key', () => {
    const registry = buildColumnRegistry('product', { thumbnail: { type: 'attribute' } });

    expect(registry.get('thumbnail')?.type).toBe('thumbnail');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('maps legacy type and sort names', () => {
    const registry = buildColumnRegistry('product', {
      stock: { type: 'meta', orderby: 'attribute_value_num' },
      brand: { type: 'acf' },
    });

    expect(registry.get('stock')?.type).toBe('attribute');
    expect(registry.get('stock')?.orderable_key).toBe('attribute_value_num');
    expect(registry.get('brand')?.type).toBe('external-field');
  });

  it('defaults the image size of image columns', () => {
    const registry = buildColumnRegistry('product', { logo: { type: 'image', height: 32 } });

    expect(registry.get('logo')).toMatchObject({ type: 'image', image_size: 'thumbnail', height: 32 });
  });

  it('throws ConfigurationError naming the malformed key', () => {
    let caught: unknown;
    try {
      buildColumnRegistry('product', { sku: {}, price: 'yes' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const error = caught as ConfigurationError;
    expect(error.column_key).toBe('price');
    expect(error.message).toContain('"price"');
  });

  it('rejects unknown types and non-function transforms', () => {
    expect(() => buildColumnRegistry('product', { sku: { type: 'html' } })).toThrow(ConfigurationError);
    expect(() => buildColumnRegistry('product', { sku: { transform: 'upper' } })).toThrow('transform must be a function');
  });

  it('freezes the registry and its specs', () => {
    const registry = buildColumnRegistry('product', { sku: {} });

    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.get('sku'))).toBe(true);
  });

  it('owns only the primary query of its content type', () => {
    const registry = buildColumnRegistry('product', {});
    const query = {
      content_type: 'product',
      is_primary: true,
      sort_key: '',
      sort_direction: 'desc' as const,
      search_term: '',
      attribute_key: null,
      attribute_filters: null,
      limit: 20,
      offset: 0,
    };

    expect(registry.owns(query)).toBe(true);
    expect(registry.owns({ ...query, is_primary: false })).toBe(false);
    expect(registry.owns({ ...query, content_type: 'page' })).toBe(false);
  });
});
