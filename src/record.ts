import { z } from "zod";
import { CorruptRecordError } from "./errors.js";
import type { Serializer } from "./serializer.js";

const storedItemSchema = z.tuple([
  z.unknown(),
  z.array(z.string()),
  z.number().int().nullable(),
]);

const tagListSchema = z.array(z.string());

/** On-disk item record: value, tags at save time, expiration in ms */
export type StoredItem = z.infer<typeof storedItemSchema>;

export function encodeItem(serializer: Serializer, record: StoredItem): Buffer {
  return serializer.serialize(record);
}

export function decodeItem(serializer: Serializer, data: Buffer, path: string): StoredItem {
  return decode(serializer, storedItemSchema, data, path);
}

export function encodeList(serializer: Serializer, list: readonly string[]): Buffer {
  return serializer.serialize([...list]);
}

export function decodeList(serializer: Serializer, data: Buffer, path: string): string[] {
  return decode(serializer, tagListSchema, data, path);
}

function decode<S extends z.ZodTypeAny>(
  serializer: Serializer,
  schema: S,
  data: Buffer,
  path: string,
): z.output<S> {
  let raw: unknown;
  try {
    raw = serializer.deserialize(data);
  } catch (err) {
    throw new CorruptRecordError(`Unable to deserialize ${path}`, path, { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptRecordError(`Unexpected record layout in ${path}`, path, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
