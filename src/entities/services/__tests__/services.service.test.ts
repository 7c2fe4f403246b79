import { ServicesService } from '../services.service';
import { serviceListQuerySchema, serviceSchema } from '../services.dto';
import { unavailableStore } from '@/lib/db/store';
import { StoreUnavailableError } from '@/lib/db/errors';
import { availableStore, InMemoryDatabase } from '@/__tests__/support/in-memory-database';

describe('ServicesService', () => {
  it('creates and lists services', async () => {
    const db = new InMemoryDatabase();
    const service = new ServicesService(availableStore(db));

    const { id } = await service.create(serviceSchema.parse({ name: 'Remodeling', slug: 'remodeling' }));
    const listed = await service.list(serviceListQuerySchema.parse({}).limit);

    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatchObject({ _id: id, name: 'Remodeling', slug: 'remodeling', gallery: [], categories: [] });
  });

  it('honours the limit', async () => {
    const db = new InMemoryDatabase();
    const service = new ServicesService(availableStore(db));
    for (const slug of ['a', 'b', 'c']) {
      await service.create(serviceSchema.parse({ name: slug, slug }));
    }

    await expect(service.list(2)).resolves.toHaveLength(2);
  });

  it('lists nothing and refuses writes without a database', async () => {
    const service = new ServicesService(unavailableStore('offline'));

    await expect(service.list(50)).resolves.toStrictEqual([]);
    await expect(service.create(serviceSchema.parse({ name: 'x', slug: 'x' }))).rejects.toBeInstanceOf(
      StoreUnavailableError,
    );
  });
});
