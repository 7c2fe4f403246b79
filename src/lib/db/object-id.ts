import { mongo } from 'mongoose';
import { ObjectId } from './types';

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * True for the 24-character hex form of an ObjectId. Checked before any
 * `_id` clause is built so malformed input never reaches the driver.
 */
export function isValidId(value: string): boolean {
  return OBJECT_ID_PATTERN.test(value);
}

export function toObjectId(value: string): ObjectId {
  return new mongo.ObjectId(value);
}
