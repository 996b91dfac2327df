/**
 * fn-forms core type definitions
 */

/**
 * Control kind names (also used as packed control discriminator)
 */
export type ControlKind = 'TextField' | 'ComboBox' | 'Slider' | 'FileUpload' | 'Apply';

/**
 * Fields shared by every view
 */
export interface ViewBase {
  /** Owning control id */
  readonly id: string;
  readonly enabled: boolean;
  readonly label: string | null;
  /** Unset control optionality renders as false */
  readonly optional: boolean;
}

export interface TextFieldView extends ViewBase {
  readonly type: 'TextFieldView';
  readonly data: string | null;
}

export interface ComboBoxView extends ViewBase {
  readonly type: 'ComboBoxView';
  /** Index into titles */
  readonly selected: number;
  readonly titles: readonly string[] | null;
}

export interface SliderView extends ViewBase {
  readonly type: 'SliderView';
  readonly selected: number;
  readonly data: readonly number[] | null;
}

export interface FileUploadView extends ViewBase {
  readonly type: 'FileUploadView';
  readonly isText: boolean;
  /** Uploaded bytes, absent when nothing was uploaded */
  readonly data?: Uint8Array | null;
}

export interface ApplyView extends ViewBase {
  readonly type: 'ApplyView';
}

/**
 * Immutable snapshot of one control's renderable state
 */
export type View = TextFieldView | ComboBoxView | SliderView | FileUploadView | ApplyView;

export type ViewType = View['type'];

/**
 * How a node with an update function decides to recompute.
 * - self: only when the node itself received a new view (memoized)
 * - transitive: also when a parent changed since the last computation
 */
export type InvalidationPolicy = 'self' | 'transitive';

/**
 * Control reference accepted by `depends`: the control itself or its id
 */
export type ControlRef = { readonly id: string } | string;

/**
 * Options shared by every control constructor
 */
export interface ControlOptions {
  /** Generated when omitted */
  id?: string;
  label?: string | null;
  depends?: ControlRef | readonly ControlRef[];
  /** Tri-state: undefined/null means not yet reconciled with a function parameter */
  optional?: boolean | null;
  enabled?: boolean;
}
