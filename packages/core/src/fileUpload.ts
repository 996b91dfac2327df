import { Control, type UpdateFunction } from './control.js';
import { reviveFunction } from './functionSource.js';
import type { PackedFileUpload } from './packed.js';
import type { ControlOptions, FileUploadView, View } from './types.js';

export interface FileUploadOptions extends ControlOptions {
  /** Decode uploads as UTF-8 text (default) or keep raw bytes */
  isText?: boolean;
  update?: UpdateFunction<FileUpload>;
}

export class FileUpload extends Control<FileUploadView, string | Buffer> {
  readonly kind = 'FileUpload' as const;

  isText: boolean;
  data: Uint8Array | null = null;

  protected readonly updateFunction: UpdateFunction<FileUpload> | undefined;

  constructor(options: FileUploadOptions = {}) {
    super(options, true);
    this.isText = options.isText ?? true;
    this.updateFunction = options.update;
  }

  protected runUpdate(parents: readonly Control[]): void {
    this.updateFunction?.(this, parents);
  }

  protected accepts(view: View): view is FileUploadView {
    return view.type === 'FileUploadView';
  }

  protected takeView(view: FileUploadView): void {
    this.isText = view.isText;
    this.data = view.data ?? null;
  }

  protected render(): FileUploadView {
    return {
      type: 'FileUploadView',
      id: this.id,
      enabled: this.enabled,
      label: this.label,
      optional: this.optional ?? false,
      isText: this.isText,
      data: this.data,
    };
  }

  protected resolveValue(): string | Buffer | null {
    if (this.data === null) return null;
    const bytes = Buffer.from(this.data);
    return this.isText ? bytes.toString('utf8') : bytes;
  }

  /** Uploaded content is not part of the packed control */
  pack(): PackedFileUpload {
    return {
      ...this.packBase(),
      kind: this.kind,
      isText: this.isText,
    };
  }

  static unpack(record: PackedFileUpload): FileUpload {
    return new FileUpload({
      id: record.id,
      label: record.label,
      enabled: record.enabled,
      optional: record.optional,
      depends: record.depends,
      isText: record.isText,
      update: record.update === null ? undefined : reviveFunction(record.update, `update function of "${record.id}"`),
    });
  }
}
