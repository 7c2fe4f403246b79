/**
 * Property search filter builder
 * Folds the optional search fields into one MongoDB predicate. Each field
 * maps to its own clause; absent fields contribute nothing, so an empty
 * search yields `{}` and matches every property.
 */

import type { PropertyStatus, PropertyType } from '@/entities/properties/properties.dto';

export interface PropertySearchParams {
  /** Free text matched against location, city and state. */
  location?: string;
  type?: PropertyType;
  status?: PropertyStatus;
  minPrice?: number;
  maxPrice?: number;
  /** Minimum number of bedrooms. */
  bedrooms?: number;
  /** Minimum number of bathrooms. */
  bathrooms?: number;
  featured?: boolean;
}

export type SubstringMatch = { $regex: string; $options: 'i' };
export type NumericRange = { $gte?: number; $lte?: number };
export type MinimumThreshold = { $gte: number };

export const LOCATION_FIELDS = ['location', 'city', 'state'] as const;

export type LocationField = typeof LOCATION_FIELDS[number];
export type LocationClause = { [F in LocationField]: { [K in F]: SubstringMatch } }[LocationField];

export type PropertyFilter = {
  $or?: LocationClause[];
  type?: PropertyType;
  status?: PropertyStatus;
  price?: NumericRange;
  bedrooms?: MinimumThreshold;
  bathrooms?: MinimumThreshold;
  featured?: boolean;
};

type FilterClause = (params: PropertySearchParams) => PropertyFilter;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsIgnoringCase(text: string): SubstringMatch {
  return { $regex: escapeRegExp(text), $options: 'i' };
}

function locationClause(field: LocationField, match: SubstringMatch): LocationClause {
  switch (field) {
    case 'location':
      return { location: match };
    case 'city':
      return { city: match };
    case 'state':
      return { state: match };
  }
}

/** Clause built from one field, skipped when the field is absent. */
function whenPresent<K extends keyof PropertySearchParams>(
  key: K,
  toFilter: (value: NonNullable<PropertySearchParams[K]>) => PropertyFilter,
): FilterClause {
  return (params) => {
    const value = params[key];
    return value != null ? toFilter(value) : {};
  };
}

const clauses: FilterClause[] = [
  whenPresent('location', (location) => {
    if (location === '') {
      return {};
    }
    const match = containsIgnoringCase(location);
    return { $or: LOCATION_FIELDS.map((field) => locationClause(field, match)) };
  }),
  whenPresent('type', (type) => ({ type })),
  whenPresent('status', (status) => ({ status })),
  ({ minPrice, maxPrice }) => {
    if (minPrice == null && maxPrice == null) {
      return {};
    }
    const price: NumericRange = {};
    if (minPrice != null) {
      price.$gte = minPrice;
    }
    if (maxPrice != null) {
      price.$lte = maxPrice;
    }
    return { price };
  },
  whenPresent('bedrooms', (bedrooms) => ({ bedrooms: { $gte: bedrooms } })),
  whenPresent('bathrooms', (bathrooms) => ({ bathrooms: { $gte: bathrooms } })),
  whenPresent('featured', (featured) => ({ featured })),
];

export function buildPropertyFilter(params: PropertySearchParams): PropertyFilter {
  return clauses.reduce<PropertyFilter>((filter, clause) => ({ ...filter, ...clause(params) }), {});
}
