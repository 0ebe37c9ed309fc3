const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

export const isHex = (value: unknown, byteLength?: number): value is string => {
  if (typeof value !== 'string' || !HEX_PATTERN.test(value)) return false;
  return byteLength === undefined || value.length === byteLength * 2;
};

export const encodeHex = (bytes: Uint8Array): string =>
  Buffer.from(bytes).toString('hex');

export const decodeHex = (value: string): Uint8Array => {
  if (!isHex(value)) {
    throw new Error('Value is not lowercase hex');
  }
  return new Uint8Array(Buffer.from(value, 'hex'));
};
