/**
 * fn-forms executor type definitions
 */

import { z } from 'zod';
import { packedViewSchema, type View } from '@fn-forms/core';

export const ARCHIVE_FORMATS = ['tar', 'tar.gz'] as const;

export type ArchiveFormat = (typeof ARCHIVE_FORMATS)[number];

/**
 * How the runner obtains the function
 * - source: `<module path>#<export name>`, module path relative to the app directory
 * - serialized: `<bundle>#<export name>` for a bundled module, or the name
 *   of a JSON file holding the function source
 */
export const functionSettingsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('source'), data: z.string().regex(/^[^#]+#[^#]+$/, 'expected <module>#<export>') }),
  z.object({ type: z.literal('serialized'), data: z.string().min(1) }),
]);

export type FunctionSettings = z.output<typeof functionSettingsSchema>;

export const appSettingsSchema = z.object({
  archive: z.enum(ARCHIVE_FORMATS),
  function: functionSettingsSchema,
  /** Packed controller file name */
  controller: z.string().min(1),
  /** Function parameter names, in call order */
  parameters: z.array(z.string()).default([]),
});

export type AppSettings = z.output<typeof appSettingsSchema>;

export const serializedFunctionSchema = z.object({
  name: z.string().nullable().default(null),
  source: z.string().min(1),
});

export type SerializedFunction = z.output<typeof serializedFunctionSchema>;

export interface MediaType {
  contentType: string;
  application: string | null;
}

/**
 * Packaged app, ready to be stored or handed to AppDecoder
 */
export interface FrameData {
  content: Buffer;
  mediaType: MediaType;
  description: string | null;
  params: Record<string, unknown>;
  settings: AppSettings;
}

export const encodedOutputSchema = z.object({
  application: z.string().nullable().default(null),
  contentType: z.string(),
  /** base64 */
  data: z.string(),
});

export type EncodedOutput = z.output<typeof encodedOutputSchema>;

export const EXECUTION_STATUSES = ['READY', 'SCHEDULED', 'RUNNING', 'FINISHED', 'FAILED'] as const;

export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

export const executionRecordSchema = z.object({
  status: z.enum(EXECUTION_STATUSES),
  views: z.array(packedViewSchema).default([]),
  output: encodedOutputSchema.nullable().default(null),
  logs: z.string().nullable().default(null),
});

/**
 * Persisted state of one execution (`executions/<id>.json`)
 */
export type ExecutionRecord = z.output<typeof executionRecordSchema>;

export interface Execution {
  id: string;
  status: ExecutionStatus;
  /** Last known snapshot */
  views: View[];
  output: EncodedOutput | null;
  /** Failure trace */
  logs: string | null;
}

export function isTerminal(status: ExecutionStatus): boolean {
  return status === 'FINISHED' || status === 'FAILED';
}
