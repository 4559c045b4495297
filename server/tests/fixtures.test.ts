import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MenuItemSchema, TenantSchema } from '../src/store/tenant.types.js';
import { makeMenuItem, makeTenant } from './helpers/fixtures.js';

// cached entries are compared as JSON text, so fixtures keep the schema's key order
describe('fixtures', () => {
  it('builds menu items in schema key order with overrides applied', () => {
    const item = makeMenuItem({ id: 'item-x', name: 'Panna Cotta', price: 7.5, category: 'dessert' });

    assert.deepEqual(Object.keys(item), Object.keys(MenuItemSchema.shape));
    assert.equal(item.id, 'item-x');
    assert.equal(item.name, 'Panna Cotta');
    assert.equal(item.price, 7.5);
    assert.equal(item.category, 'dessert');
    assert.equal(JSON.stringify(MenuItemSchema.parse(item)), JSON.stringify(item));
  });

  it('builds tenants in schema key order', () => {
    const tenant = makeTenant({ aiName: 'Luca' });

    assert.deepEqual(Object.keys(tenant), Object.keys(TenantSchema.shape));
    assert.equal(JSON.stringify(TenantSchema.parse(tenant)), JSON.stringify(tenant));
  });
});
