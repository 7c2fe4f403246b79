// Collection names, one per stored entity

export const PROPERTY_COLLECTION = 'property';
export const SERVICE_COLLECTION = 'service';
export const LEAD_COLLECTION = 'lead';

export type CollectionName = typeof PROPERTY_COLLECTION | typeof SERVICE_COLLECTION | typeof LEAD_COLLECTION;
