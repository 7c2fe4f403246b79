/**
 * Demo data seeding
 * Fills empty collections with a handful of sample documents so a fresh
 * deployment has something to show. Collections that already hold
 * documents are left alone.
 */

import logger from 'jet-logger';
import { z } from 'zod';
import demoData from './demo-data.json';
import { propertySchema } from '@/entities/properties/properties.dto';
import { serviceSchema } from '@/entities/services/services.dto';
import { CollectionName, PROPERTY_COLLECTION, SERVICE_COLLECTION } from './constants';
import { createDocument } from './store';
import { DocumentDatabase, NewDocument } from './types';

export interface SeedResult {
  properties: number;
  services: number;
}

async function seedCollection(
  db: DocumentDatabase,
  collectionName: CollectionName,
  documents: NewDocument[],
): Promise<number> {
  const existing = await db.collection(collectionName).countDocuments({});
  if (existing > 0) {
    logger.info(`[Seed] "${collectionName}" already has ${existing} documents, skipping`);
    return 0;
  }
  for (const document of documents) {
    await createDocument(db, collectionName, document);
  }
  logger.info(`[Seed] Inserted ${documents.length} documents into "${collectionName}"`);
  return documents.length;
}

export async function seedDemoData(db: DocumentDatabase): Promise<SeedResult> {
  const properties = z.array(propertySchema).parse(demoData.properties);
  const services = z.array(serviceSchema).parse(demoData.services);

  return {
    properties: await seedCollection(db, PROPERTY_COLLECTION, properties),
    services: await seedCollection(db, SERVICE_COLLECTION, services),
  };
}
