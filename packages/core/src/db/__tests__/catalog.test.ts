import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { catalogFromColumnRows, renderCatalog } from '../catalog.js';

describe('catalogFromColumnRows', () => {
  it('groups columns by table in first-seen order', () => {
    const capturedAt = new Date('2024-05-01T00:00:00.000Z');
    const catalog = catalogFromColumnRows(
      [
        { table_name: 'customers', column_name: 'id' },
        { table_name: 'customers', column_name: 'name' },
        { table_name: 'orders', column_name: 'id' },
        { table_name: 'orders', column_name: 'status' },
      ],
      capturedAt,
    );
    assert.deepEqual(catalog, {
      tables: [
        { name: 'customers', columns: ['id', 'name'] },
        { name: 'orders', columns: ['id', 'status'] },
      ],
      capturedAt,
    });
  });
});

describe('renderCatalog', () => {
  it('renders one line per table', () => {
    const catalog = catalogFromColumnRows([
      { table_name: 'products', column_name: 'id' },
      { table_name: 'products', column_name: 'sku' },
      { table_name: 'expenses', column_name: 'amount' },
    ]);
    assert.equal(renderCatalog(catalog), '- products (id, sku)\n- expenses (amount)');
  });

  it('renders an empty catalog as an empty string', () => {
    assert.equal(renderCatalog(catalogFromColumnRows([])), '');
  });
});
