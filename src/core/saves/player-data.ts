/**
 * Field scan over the binary player record stored in `players.db`
 *
 * The record format is undocumented. Fields are found by looking for a
 * string marker (0x02) followed by a big-endian u16 length and a UTF-8 key,
 * then reading one typed value after the key. Only keys that look like
 * character details are kept.
 */

export type PlayerValue = string | number | boolean | null;

const TYPE_DOUBLE = 0x01;
const TYPE_STRING = 0x02;
const TYPE_TRUE = 0x04;
const TYPE_FALSE = 0x05;

const MAX_KEY_LENGTH = 200;
// The scan stops this many bytes short of the end
const TAIL_BYTES = 10;

const KEY_KEYWORDS = [
  "trait",
  "profession",
  "name",
  "surname",
  "forename",
  "hour",
  "zombie",
  "kill",
  "strength",
  "fitness",
];

const utf8 = new TextDecoder("utf-8", { fatal: true });

class RecordReader {
  position = 0;

  constructor(private readonly data: Uint8Array) {}

  get length(): number {
    return this.data.length;
  }

  readByte(): number {
    const byte = this.data[this.position];
    if (byte === undefined) return 0;
    this.position++;
    return byte;
  }

  readUint16(): number {
    if (this.position + 2 > this.data.length) return 0;
    const value = new DataView(this.data.buffer, this.data.byteOffset + this.position, 2).getUint16(0);
    this.position += 2;
    return value;
  }

  readDouble(): number {
    if (this.position + 8 > this.data.length) return 0;
    const value = new DataView(this.data.buffer, this.data.byteOffset + this.position, 8).getFloat64(0);
    this.position += 8;
    return value;
  }

  /** Decoded bytes, or null when they are not valid UTF-8 */
  readUtf8(length: number): string | null {
    const bytes = this.data.subarray(this.position, this.position + length);
    this.position += length;
    try {
      return utf8.decode(bytes);
    } catch {
      return null;
    }
  }

  readString(): string {
    const length = this.readUint16();
    if (length === 0 || this.position + length > this.data.length) return "";
    return this.readUtf8(length) ?? "";
  }

  readValue(type: number): PlayerValue {
    switch (type) {
      case TYPE_DOUBLE:
        return this.readDouble();
      case TYPE_STRING:
        return this.readString();
      case TYPE_TRUE:
        return true;
      case TYPE_FALSE:
        return false;
      default:
        return null;
    }
  }
}

/**
 * Character fields found in a player record, in the order they appear.
 * A key seen twice keeps its first position and its last value.
 */
export function parsePlayerData(data: Uint8Array): Map<string, PlayerValue> {
  const fields = new Map<string, PlayerValue>();
  const reader = new RecordReader(data);

  while (reader.position < reader.length - TAIL_BYTES) {
    if (reader.readByte() !== TYPE_STRING) continue;

    const keyLength = reader.readUint16();
    if (keyLength <= 1 || keyLength >= MAX_KEY_LENGTH || reader.position + keyLength > reader.length) {
      continue;
    }

    const key = reader.readUtf8(keyLength);
    if (key === null) continue;

    const value = reader.readValue(reader.readByte());
    const lowered = key.toLowerCase();
    if (KEY_KEYWORDS.some((keyword) => lowered.includes(keyword))) {
      fields.set(key, value);
    }
  }

  return fields;
}

export function traitsOf(fields: Map<string, PlayerValue>): string[] {
  const traits: string[] = [];
  for (const [key, value] of fields) {
    if (key.toLowerCase().includes("trait") && typeof value === "string" && value) {
      traits.push(value);
    }
  }
  return traits;
}

export function professionOf(fields: Map<string, PlayerValue>): string | null {
  for (const [key, value] of fields) {
    if (key.toLowerCase().includes("profession") && typeof value === "string" && value) {
      return value;
    }
  }
  return null;
}
