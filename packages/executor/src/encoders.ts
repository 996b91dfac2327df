/**
 * Output encoders: turn the function's return value into a typed content blob
 */

import type { EncodedOutput } from './types.js';

export interface EncodedContent {
  application: string | null;
  contentType: string;
  data: Buffer;
}

export interface OutputEncoder {
  accept(value: unknown): boolean;
  encode(value: unknown): EncodedContent;
}

export const stringEncoder: OutputEncoder = {
  accept: (value) => typeof value === 'string',
  encode: (value) => ({ application: null, contentType: 'text/plain', data: Buffer.from(String(value), 'utf-8') }),
};

export const bytesEncoder: OutputEncoder = {
  accept: (value) => value instanceof Uint8Array,
  encode: (value) => ({
    application: null,
    contentType: 'application/octet-stream',
    data: value instanceof Uint8Array ? Buffer.from(value) : Buffer.alloc(0),
  }),
};

/** Anything JSON.stringify can represent; undefined becomes null */
export const jsonEncoder: OutputEncoder = {
  accept: () => true,
  encode: (value) => {
    const text = JSON.stringify(value === undefined ? null : value);
    if (typeof text !== 'string') {
      throw new TypeError(`Cannot encode a value of type ${typeof value}`);
    }
    return { application: null, contentType: 'application/json', data: Buffer.from(text, 'utf-8') };
  },
};

/**
 * Picks the first encoder accepting a value
 */
export class EncoderRegistry {
  private readonly encoders: OutputEncoder[];

  constructor(encoders: readonly OutputEncoder[] = [stringEncoder, bytesEncoder, jsonEncoder]) {
    this.encoders = [...encoders];
  }

  /** Registered encoders take precedence over the built-in ones */
  register(encoder: OutputEncoder): this {
    this.encoders.unshift(encoder);
    return this;
  }

  encode(value: unknown): EncodedContent {
    const encoder = this.encoders.find((candidate) => candidate.accept(value));
    if (!encoder) {
      throw new TypeError(`No encoder accepts a value of type ${typeof value}`);
    }
    return encoder.encode(value);
  }
}

export function encodeOutput(value: unknown, registry: EncoderRegistry = new EncoderRegistry()): EncodedOutput {
  const { application, contentType, data } = registry.encode(value);
  return { application, contentType, data: data.toString('base64') };
}

/**
 * Text and JSON outputs become strings and values; anything else stays bytes
 */
export function decodeOutput(output: EncodedOutput): unknown {
  const data = Buffer.from(output.data, 'base64');
  if (output.contentType === 'application/json') return JSON.parse(data.toString('utf-8'));
  if (output.contentType.startsWith('text/')) return data.toString('utf-8');
  return data;
}
