import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import { buildHarness, flushAsync } from './helpers/harness.js';
import { StubProvider } from './helpers/stub-provider.js';
import { TENANT_ID } from './helpers/fixtures.js';

const TENANT_HOST = 'trattoria.menus.example.com';
const FIXED_NOW = () => Date.UTC(2024, 5, 1, 12);

describe('POST /api/chat', () => {
  it('answers a greeting for the tenant named by the host', async () => {
    const app = buildHarness().createApp();

    const res = await request(app)
      .post('/api/chat')
      .set('Host', TENANT_HOST)
      .send({ message: 'hello', session_id: 's1' });

    assert.equal(res.status, 200);
    assert.equal(res.body.success, true);
    assert.equal(
      res.body.response,
      "Hello! Welcome to Trattoria Test! I'm Sophie, here to help you discover delicious dishes that match your taste. What can I help you find today?"
    );
    assert.equal(res.body.recommendations.length, 3);
    assert.deepEqual(res.body.tenant, { name: 'Trattoria Test', aiName: 'Sophie' });
    assert.ok(res.headers['x-trace-id']);
  });

  it('routes by the /r/ slug path', async () => {
    const app = buildHarness().createApp();

    const res = await request(app).post('/r/trattoria-test/api/chat').send({ message: 'do you have vegan options' });

    assert.equal(res.status, 200);
    assert.equal(res.body.response, 'We offer 2 tasty vegan dishes! I especially recommend: Bruschetta and Spicy Arrabbiata.');
    assert.deepEqual(
      res.body.recommendations,
      [
        { id: 'item-bruschetta', name: 'Bruschetta', price: 9.5, description: 'Toasted bread with tomato and basil' },
        { id: 'item-arrabbiata', name: 'Spicy Arrabbiata', price: 14.25, description: 'Penne in a fiery tomato sauce' }
      ]
    );
  });

  it('routes by restaurant_id in the body', async () => {
    const app = buildHarness().createApp();

    const res = await request(app).post('/api/chat').send({ message: 'tell me about tiramisu', restaurant_id: 'trattoria-test' });

    assert.equal(res.status, 200);
    assert.equal(
      res.body.response,
      "Great choice! Our Tiramisu is Layers of espresso-soaked sponge and mascarpone. It's priced at $8.00."
    );
  });

  it('answers 404 when no tenant can be resolved', async () => {
    const h = buildHarness();

    const res = await request(h.createApp()).post('/api/chat').send({ message: 'hello' });

    assert.equal(res.status, 404);
    assert.deepEqual(res.body, { success: false, error: 'Restaurant not found' });
    assert.deepEqual(h.store.calls, []);
  });

  it('answers 400 for a blank or missing message', async () => {
    const app = buildHarness().createApp();

    const blank = await request(app).post('/api/chat').set('Host', TENANT_HOST).send({ message: '   ' });
    const missing = await request(app).post('/api/chat').set('Host', TENANT_HOST).send({ session_id: 's1' });

    assert.equal(blank.status, 400);
    assert.deepEqual(blank.body, { success: false, error: 'Empty message' });
    assert.equal(missing.status, 400);
    assert.deepEqual(missing.body, { success: false, error: 'Empty message' });
  });

  it('answers 400 for a body of the wrong shape', async () => {
    const app = buildHarness().createApp();

    const res = await request(app).post('/api/chat').set('Host', TENANT_HOST).send({ message: 42 });

    assert.equal(res.status, 400);
    assert.deepEqual(res.body, { success: false, error: 'Invalid request' });
  });

  it('answers 400 for malformed JSON', async () => {
    const app = buildHarness().createApp();

    const res = await request(app)
      .post('/api/chat')
      .set('Host', TENANT_HOST)
      .set('Content-Type', 'application/json')
      .send('{"message":');

    assert.equal(res.status, 400);
    assert.deepEqual(res.body, { success: false, error: 'Invalid request' });
  });

  it('answers 503 when the durable store is down', async () => {
    const h = buildHarness();
    h.store.down = true;

    const res = await request(h.createApp()).post('/api/chat').set('Host', TENANT_HOST).send({ message: 'hello' });

    assert.equal(res.status, 503);
    assert.deepEqual(res.body, { success: false, error: 'Service temporarily unavailable' });
  });

  it('hides unexpected failures behind a generic 500', async () => {
    const provider = new StubProvider(async () => {
      throw new RangeError('secret internal detail');
    });
    const app = buildHarness({ provider }).createApp();

    const res = await request(app).post('/api/chat').set('Host', TENANT_HOST).send({ message: 'hello' });

    assert.equal(res.status, 500);
    assert.deepEqual(res.body, { success: false, error: 'Failed to generate response' });
  });

  it('echoes a client trace id', async () => {
    const app = buildHarness().createApp();

    const res = await request(app)
      .post('/api/chat')
      .set('Host', TENANT_HOST)
      .set('x-trace-id', 'trace-123')
      .send({ message: 'hello' });

    assert.equal(res.headers['x-trace-id'], 'trace-123');
  });
});

describe('GET /api/menu', () => {
  it('lists the menu of the tenant named in the query', async () => {
    const app = buildHarness().createApp();

    const res = await request(app).get('/api/menu').query({ restaurant_id: 'trattoria-test' });

    assert.equal(res.status, 200);
    assert.deepEqual(res.body.restaurant, { id: TENANT_ID, name: 'Trattoria Test' });
    assert.equal(res.body.count, 5);
    assert.deepEqual(
      res.body.items.map((item: { name: string }) => item.name),
      ['Bruschetta', 'Margherita Pizza', 'Spicy Arrabbiata', 'Grilled Salmon', 'Tiramisu']
    );
  });

  it('answers 404 for an unknown tenant', async () => {
    const app = buildHarness().createApp();

    const res = await request(app).get('/r/nowhere/api/menu');

    assert.equal(res.status, 404);
    assert.deepEqual(res.body, { success: false, error: 'Restaurant not found' });
  });
});

describe('GET / and /r/:slug', () => {
  it('returns the landing payload without a tenant hint', async () => {
    const res = await request(buildHarness().createApp()).get('/');

    assert.equal(res.status, 200);
    assert.equal(res.body.success, true);
    assert.equal(res.body.restaurant, null);
  });

  it('returns the tenant home payload', async () => {
    const res = await request(buildHarness().createApp()).get('/r/trattoria-test');

    assert.equal(res.status, 200);
    assert.deepEqual(res.body.restaurant, {
      id: TENANT_ID,
      name: 'Trattoria Test',
      aiName: 'Sophie',
      slug: 'trattoria-test',
      welcomeMessage: null,
      themeConfig: { primaryColor: '#aa3311' }
    });
  });

  it('answers 404 for a slug with no active tenant', async () => {
    const res = await request(buildHarness().createApp()).get('/r/nowhere');
    assert.equal(res.status, 404);
  });
});

describe('GET /api/stats/:tenantId', () => {
  it('rejects an id that is not a UUID', async () => {
    const res = await request(buildHarness().createApp()).get('/api/stats/not-a-uuid');

    assert.equal(res.status, 400);
    assert.deepEqual(res.body, { success: false, error: 'Invalid request' });
  });

  it('reports daily conversation counts', async () => {
    const h = buildHarness({ now: FIXED_NOW });
    const app = h.createApp();

    await request(app).post('/api/chat').set('Host', TENANT_HOST).send({ message: 'hello', session_id: 'a' });
    await request(app).post('/api/chat').set('Host', TENANT_HOST).send({ message: 'thanks', session_id: 'a' });
    await request(app).post('/api/chat').set('Host', TENANT_HOST).send({ message: 'hello', session_id: 'b' });
    await flushAsync();

    const res = await request(app).get(`/api/stats/${TENANT_ID}`);

    assert.equal(res.status, 200);
    assert.deepEqual(res.body, {
      success: true,
      stats: [{ date: '2024-06-01', totalConversations: 3, uniqueSessions: 2 }]
    });
  });
});

describe('POST /api/tenants/:tenantId/cache/invalidate', () => {
  const path = `/api/tenants/${TENANT_ID}/cache/invalidate`;

  it('does not exist without an admin key', async () => {
    const res = await request(buildHarness().createApp()).post(path);
    assert.equal(res.status, 404);
  });

  it('requires the bearer token', async () => {
    const app = buildHarness({ adminApiKey: 'test-secret' }).createApp();

    const missing = await request(app).post(path);
    const wrong = await request(app).post(path).set('Authorization', 'Bearer nope');

    assert.equal(missing.status, 401);
    assert.equal(wrong.status, 401);
  });

  it('drops the cached profile and menu', async () => {
    const h = buildHarness({ adminApiKey: 'test-secret' });
    const app = h.createApp();

    await request(app).get('/api/menu').set('Host', TENANT_HOST);
    const res = await request(app).post(path).set('Authorization', 'Bearer test-secret');

    assert.equal(res.status, 200);
    assert.deepEqual(res.body, {
      success: true,
      tenantId: TENANT_ID,
      keys: [`menu:${TENANT_ID}`, 'profile:subdomain:trattoria', 'profile:slug:trattoria-test'],
      cacheCleared: true
    });

    await request(app).get('/api/menu').set('Host', TENANT_HOST);
    assert.equal(h.store.count('listMenuItems'), 2);
  });

  it('rejects an id that is not a UUID', async () => {
    const app = buildHarness({ adminApiKey: 'test-secret' }).createApp();

    const res = await request(app).post('/api/tenants/abc/cache/invalidate').set('Authorization', 'Bearer test-secret');
    assert.equal(res.status, 400);
  });
});

it('answers unknown routes with a JSON 404', async () => {
  const res = await request(buildHarness().createApp()).get('/api/does-not-exist');

  assert.equal(res.status, 404);
  assert.deepEqual(res.body, { success: false, error: 'Not found' });
});
