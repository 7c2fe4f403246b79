import { mongo } from 'mongoose';
import { SerializedDocument } from './types';

/**
 * Turns a stored document into its wire form. Every outbound document goes
 * through here; empty input is returned as is.
 */
export function serializeDoc(doc: null): null;
export function serializeDoc(doc: Record<string, unknown>): SerializedDocument;
export function serializeDoc(doc: Record<string, unknown> | null): SerializedDocument | null;
export function serializeDoc(doc: Record<string, unknown> | null): SerializedDocument | null {
  if (doc === null) {
    return null;
  }
  if (Object.keys(doc).length === 0) {
    return {};
  }
  const { _id, ...rest } = doc;
  if (_id === undefined) {
    return { ...rest };
  }
  return { _id: _id instanceof mongo.ObjectId ? _id.toHexString() : String(_id), ...rest };
}
