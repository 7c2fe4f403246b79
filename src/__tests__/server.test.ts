import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { createServer } from '@/server';
import { unavailableStore } from '@/lib/db/store';
import { Store } from '@/lib/db/types';
import type { ScoredLead } from '@/entities/leads/leads.dto';
import { availableStore, InMemoryDatabase } from './support/in-memory-database';

interface RunningApp {
  server: Server;
  client: AxiosInstance;
  forward: jest.Mock<void, [ScoredLead]>;
}

async function startApp(store: Store): Promise<RunningApp> {
  const forward = jest.fn<void, [ScoredLead]>();
  const app = createServer({
    store,
    leadForwarder: { forward },
    databaseUrlConfigured: store.status === 'available',
    corsOrigin: '*',
  });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  const client = axios.create({
    baseURL: `http://127.0.0.1:${address.port}`,
    validateStatus: () => true,
  });
  return { server, client, forward };
}

function stopApp(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

const casaSol = {
  title: 'Casa Sol',
  slug: 'casa-sol',
  price: 420000,
  location: 'Playa del Carmen',
  bedrooms: 3,
  seo: { title: 'Casa Sol for sale' },
};

describe('HTTP API with a database', () => {
  let app: RunningApp;

  beforeEach(async () => {
    app = await startApp(availableStore(new InMemoryDatabase('realty')));
  });

  afterEach(() => stopApp(app.server));

  it('answers the root and diagnostic endpoints', async () => {
    const root = await app.client.get('/');
    expect(root.status).toBe(200);
    expect(root.data).toStrictEqual({ name: 'Luxury Real Estate & Construction API', status: 'ok' });

    const test = await app.client.get('/test');
    expect(test.status).toBe(200);
    expect(test.data).toMatchObject({ database: '✅ Connected & Working', database_name: 'realty' });
  });

  it('creates a property and reads it back by slug and by id', async () => {
    const created = await app.client.post('/api/properties', casaSol);
    expect(created.status).toBe(201);
    expect(created.data.id).toMatch(/^[0-9a-f]{24}$/);

    const bySlug = await app.client.get('/api/properties/casa-sol');
    const byId = await app.client.get(`/api/properties/${created.data.id}`);
    expect(bySlug.status).toBe(200);
    expect(bySlug.data).toMatchObject({ _id: created.data.id, title: 'Casa Sol', status: 'available' });
    expect(byId.data).toStrictEqual(bySlug.data);
  });

  it('answers 422 with field details for an invalid body', async () => {
    const response = await app.client.post('/api/properties', { title: 'No price', slug: 'no-price', location: 'Centro' });

    expect(response.status).toBe(422);
    expect(response.data.error).toBe('Validation failed');
    expect(response.data.details.map((detail: { path: string }) => detail.path)).toStrictEqual(['price']);
  });

  it('answers 404 for an unknown property and 400 for a malformed id', async () => {
    const missing = await app.client.get('/api/properties/nowhere');
    expect(missing.status).toBe(404);
    expect(missing.data).toStrictEqual({ error: 'Property not found' });

    const malformed = await app.client.put('/api/properties/not-an-id', casaSol);
    expect(malformed.status).toBe(400);
    expect(malformed.data).toStrictEqual({ error: 'Invalid id' });
  });

  it('replaces a property and patches its status', async () => {
    const { data } = await app.client.post('/api/properties', casaSol);

    const replaced = await app.client.put(`/api/properties/${data.id}`, {
      title: 'Casa Sol',
      slug: 'casa-sol',
      price: 399000,
      location: 'Playa del Carmen',
    });
    expect(replaced.status).toBe(200);
    expect(replaced.data).toStrictEqual({ updated: true });

    const patched = await app.client.patch(`/api/properties/${data.id}/status`, { status: 'sold' });
    expect(patched.data).toStrictEqual({ updated: true });

    const current = await app.client.get('/api/properties/casa-sol');
    expect(current.data).toMatchObject({ price: 399000, status: 'sold', bedrooms: null, seo: null });
  });

  it('ignores blank query parameters when searching', async () => {
    await app.client.post('/api/properties', casaSol);

    const response = await app.client.get('/api/properties?price_max=&bedrooms=&type=&featured=&limit=');
    expect(response.status).toBe(200);
    expect(response.data.map((doc: { slug: string }) => doc.slug)).toStrictEqual(['casa-sol']);
  });

  it('serves SEO records and the export count', async () => {
    await app.client.post('/api/properties', casaSol);

    const seo = await app.client.get('/api/seo/Property/casa-sol');
    expect(seo.status).toBe(200);
    expect(seo.data).toStrictEqual({ title: 'Casa Sol for sale', schema_type: 'RealEstateAgent' });

    const wrongKind = await app.client.get('/api/seo/lead/casa-sol');
    expect(wrongKind.status).toBe(404);

    const exported = await app.client.get('/api/export/crm');
    expect(exported.data).toStrictEqual({ exported: 1 });
  });

  it('scores leads, hands them to the forwarder and lists them', async () => {
    const created = await app.client.post('/api/leads', {
      name: 'Ana',
      email: 'ana@example.com',
      phone: '5551234567',
      score: 99,
    });
    expect(created.status).toBe(201);
    expect(created.data.score).toBe(30);
    expect(app.forward).toHaveBeenCalledTimes(1);
    expect(app.forward.mock.calls[0][0]).toMatchObject({ name: 'Ana', score: 30, source: 'website' });

    const listed = await app.client.get('/api/leads');
    expect(listed.data).toHaveLength(1);
    expect(listed.data[0]).toMatchObject({ _id: created.data.id, score: 30 });
  });

  it('creates and lists services', async () => {
    const created = await app.client.post('/api/services', { name: 'Remodeling', slug: 'remodeling' });
    expect(created.status).toBe(201);

    const listed = await app.client.get('/api/services');
    expect(listed.data).toHaveLength(1);
    expect(listed.data[0]).toMatchObject({ name: 'Remodeling', gallery: [], categories: [] });
  });
});

describe('HTTP API without a database', () => {
  let app: RunningApp;

  beforeEach(async () => {
    app = await startApp(unavailableStore('DATABASE_URL is not set'));
  });

  afterEach(() => stopApp(app.server));

  it('lists nothing while writes fail with an explicit error', async () => {
    const list = await app.client.get('/api/properties');
    expect(list.status).toBe(200);
    expect(list.data).toStrictEqual([]);

    const create = await app.client.post('/api/properties', casaSol);
    expect(create.status).toBe(500);
    expect(create.data).toStrictEqual({ error: 'Database not available' });
  });

  it('fails lookups and lead submission the same way', async () => {
    const seo = await app.client.get('/api/seo/property/casa-sol');
    expect(seo.status).toBe(500);

    const lead = await app.client.post('/api/leads', { name: 'Ana' });
    expect(lead.status).toBe(500);
    expect(app.forward).not.toHaveBeenCalled();

    const leads = await app.client.get('/api/leads');
    expect(leads.data).toStrictEqual([]);
  });

  it('reports the missing database in the diagnostic', async () => {
    const test = await app.client.get('/test');
    expect(test.status).toBe(200);
    expect(test.data).toMatchObject({ database: '❌ Not Available', database_url: '❌ Not Set', collections: [] });
  });
});
