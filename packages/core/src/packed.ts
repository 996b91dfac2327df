/**
 * JSON shapes of serialized controls and controllers
 */

import { z } from 'zod';

const baseShape = {
  id: z.string().min(1),
  label: z.string().nullable().default(null),
  enabled: z.boolean().default(true),
  optional: z.boolean().nullable().default(null),
  /** Parent ids */
  depends: z.array(z.string()).default([]),
  /** Update function source */
  update: z.string().nullable().default(null),
};

export const packedTextFieldSchema = z.object({
  ...baseShape,
  kind: z.literal('TextField'),
  data: z.string().nullable().default(null),
  validator: z.string().nullable().default(null),
  requireApply: z.boolean().default(true),
});

export const packedListDataSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('list'), items: z.array(z.unknown()) }),
  z.object({ type: z.literal('producer'), source: z.string() }),
]);

export const packedComboBoxSchema = z.object({
  ...baseShape,
  kind: z.literal('ComboBox'),
  data: packedListDataSchema.nullable().default(null),
  selected: z.number().int().default(0),
  title: z.string().nullable().default(null),
});

export const packedSliderSchema = z.object({
  ...baseShape,
  kind: z.literal('Slider'),
  data: z.array(z.number()).default([]),
  selected: z.number().int().default(0),
});

export const packedFileUploadSchema = z.object({
  ...baseShape,
  kind: z.literal('FileUpload'),
  isText: z.boolean().default(true),
});

export const packedApplySchema = z.object({
  ...baseShape,
  kind: z.literal('Apply'),
});

export const packedControlSchema = z.discriminatedUnion('kind', [
  packedTextFieldSchema,
  packedComboBoxSchema,
  packedSliderSchema,
  packedFileUploadSchema,
  packedApplySchema,
]);

export const CONTROLLER_FORMAT_VERSION = 1;

export const packedControllerSchema = z.object({
  version: z.literal(CONTROLLER_FORMAT_VERSION),
  invalidation: z.enum(['self', 'transitive']).default('self'),
  /** Control ids passed to the function, in call order */
  parameters: z.array(z.string()),
  controls: z.array(packedControlSchema),
});

export type PackedTextField = z.output<typeof packedTextFieldSchema>;
export type PackedListData = z.output<typeof packedListDataSchema>;
export type PackedComboBox = z.output<typeof packedComboBoxSchema>;
export type PackedSlider = z.output<typeof packedSliderSchema>;
export type PackedFileUpload = z.output<typeof packedFileUploadSchema>;
export type PackedApply = z.output<typeof packedApplySchema>;
export type PackedControl = z.output<typeof packedControlSchema>;
export type PackedController = z.output<typeof packedControllerSchema>;

/** Fields every packed control carries */
export type PackedControlBase = Omit<PackedApply, 'kind'>;
