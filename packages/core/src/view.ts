/**
 * View packing (plain JSON records) and lookup helpers
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { formatZodError } from './schema.js';
import type { ApplyView, View } from './types.js';

const baseShape = {
  id: z.string().min(1),
  enabled: z.boolean().default(true),
  label: z.string().nullable().default(null),
  optional: z.boolean().nullable().default(false),
};

export const packedViewSchema = z.discriminatedUnion('type', [
  z.object({ ...baseShape, type: z.literal('TextFieldView'), data: z.string().nullable().default(null) }),
  z.object({
    ...baseShape,
    type: z.literal('ComboBoxView'),
    selected: z.number().int().default(0),
    titles: z.array(z.string()).nullable().default(null),
  }),
  z.object({
    ...baseShape,
    type: z.literal('SliderView'),
    selected: z.number().int().default(0),
    data: z.array(z.number()).nullable().default(null),
  }),
  z.object({
    ...baseShape,
    type: z.literal('FileUploadView'),
    isText: z.boolean().default(true),
    /** base64 */
    data: z.string().nullable().optional(),
  }),
  z.object({ ...baseShape, type: z.literal('ApplyView') }),
]);

export type PackedView = z.output<typeof packedViewSchema>;

/**
 * Turn a view into a JSON-safe record
 */
export function packView(view: View): PackedView {
  const base = { id: view.id, enabled: view.enabled, label: view.label, optional: view.optional };
  switch (view.type) {
    case 'TextFieldView':
      return { ...base, type: view.type, data: view.data };
    case 'ComboBoxView':
      return { ...base, type: view.type, selected: view.selected, titles: view.titles ? [...view.titles] : null };
    case 'SliderView':
      return { ...base, type: view.type, selected: view.selected, data: view.data ? [...view.data] : null };
    case 'FileUploadView':
      return {
        ...base,
        type: view.type,
        isText: view.isText,
        ...(view.data ? { data: Buffer.from(view.data).toString('base64') } : {}),
      };
    case 'ApplyView':
      return { ...base, type: view.type };
  }
}

function recordId(record: unknown): string | null {
  if (record && typeof record === 'object' && 'id' in record && typeof record.id === 'string') {
    return record.id;
  }
  return null;
}

/**
 * Parse a packed record back into a view
 */
export function unpackView(record: unknown): View {
  const parsed = packedViewSchema.safeParse(record);
  if (!parsed.success) {
    const reason = formatZodError(parsed.error);
    throw new ValidationError(recordId(record) ?? '<unknown>', new Error(`Malformed view: ${reason}`));
  }

  const packed = parsed.data;
  const base = {
    id: packed.id,
    enabled: packed.enabled,
    label: packed.label,
    optional: packed.optional ?? false,
  };
  switch (packed.type) {
    case 'TextFieldView':
      return { ...base, type: packed.type, data: packed.data };
    case 'ComboBoxView':
      return { ...base, type: packed.type, selected: packed.selected, titles: packed.titles };
    case 'SliderView':
      return { ...base, type: packed.type, selected: packed.selected, data: packed.data };
    case 'FileUploadView':
      return {
        ...base,
        type: packed.type,
        isText: packed.isText,
        data: packed.data ? new Uint8Array(Buffer.from(packed.data, 'base64')) : null,
      };
    case 'ApplyView':
      return { ...base, type: packed.type };
  }
}

export function findView(views: readonly View[], id: string): View | undefined {
  return views.find((view) => view.id === id);
}

export function findApplyView(views: readonly View[]): ApplyView | undefined {
  for (const view of views) {
    if (view.type === 'ApplyView') return view;
  }
  return undefined;
}
