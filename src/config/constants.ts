export const API_NAME = 'Luxury Real Estate & Construction API';

// Result limits for list endpoints
export const DEFAULT_LIST_LIMIT = 50;
export const DEFAULT_EXPORT_LIMIT = 100;
export const MAX_LIST_LIMIT = 200;

// Lead defaults
export const DEFAULT_LEAD_SOURCE = 'website';

// SEO defaults
export const DEFAULT_SCHEMA_TYPE = 'RealEstateAgent';

// How many collection names the diagnostic endpoint reports
export const DIAGNOSTIC_COLLECTIONS_LIMIT = 10;
