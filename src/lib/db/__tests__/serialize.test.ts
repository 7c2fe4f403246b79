import { mongo } from 'mongoose';
import { serializeDoc } from '../serialize';

describe('serializeDoc', () => {
  it('renders the ObjectId as its hex string', () => {
    const _id = new mongo.ObjectId('507f1f77bcf86cd799439011');
    expect(serializeDoc({ _id, title: 'Casa Azul', price: 250000 })).toStrictEqual({
      _id: '507f1f77bcf86cd799439011',
      title: 'Casa Azul',
      price: 250000,
    });
  });

  it('passes null through', () => {
    expect(serializeDoc(null)).toBeNull();
  });

  it('keeps an empty document empty', () => {
    expect(serializeDoc({})).toStrictEqual({});
  });

  it('copies a document without _id unchanged', () => {
    const seo = { title: 'Casa Azul', keywords: ['casa'] };
    const serialized = serializeDoc(seo);
    expect(serialized).toStrictEqual(seo);
    expect(serialized).not.toBe(seo);
  });

  it('stringifies a non-ObjectId _id', () => {
    expect(serializeDoc({ _id: 42 })).toStrictEqual({ _id: '42' });
  });
});
