import { serialize, deserialize } from "v8";

/**
 * Converts values to bytes and back. deserialize() must throw on input it
 * cannot read; the pool turns that into a cache miss.
 */
export interface Serializer {
  serialize(value: unknown): Buffer;
  deserialize(data: Buffer): unknown;
}

/**
 * Structured-clone serializer. Keeps the type of strings, numbers, booleans,
 * null, Dates, Maps, Sets and typed arrays through a round trip.
 */
export const v8Serializer: Serializer = {
  serialize: (value) => serialize(value),
  deserialize: (data) => deserialize(data),
};
