/**
 * fn-forms core - reactive control dependency graph
 *
 * Core concepts:
 * - A form is a set of controls, each rendering to an immutable view
 * - Controls resolve their parents before running their own update function
 * - The Apply control gates running the function
 */

export type {
  ControlKind,
  ViewBase,
  TextFieldView,
  ComboBoxView,
  SliderView,
  FileUploadView,
  ApplyView,
  View,
  ViewType,
  InvalidationPolicy,
  ControlRef,
  ControlOptions,
} from './types.js';

export {
  FormError,
  ConfigurationError,
  ValidationError,
  UpdateError,
  UnknownControlError,
  NoSuchModuleError,
  formatError,
} from './errors.js';

export { formatZodError } from './schema.js';
export { serializeFunction, reviveFunction, withSource, toCallable } from './functionSource.js';
export type { RevivedFunction } from './functionSource.js';

export { packedViewSchema, packView, unpackView, findView, findApplyView } from './view.js';
export type { PackedView } from './view.js';

export { Validator, FunctionalValidator, intValidator, floatValidator } from './validator.js';

export { Control, spreadParents } from './control.js';
export type { UpdateFunction, ControlGraph } from './control.js';
export { TextField } from './textField.js';
export type { TextFieldOptions } from './textField.js';
export { ComboBox } from './comboBox.js';
export type { ComboBoxOptions } from './comboBox.js';
export { Slider } from './slider.js';
export type { SliderOptions } from './slider.js';
export { FileUpload } from './fileUpload.js';
export type { FileUploadOptions } from './fileUpload.js';
export { Apply } from './apply.js';

export { ListModel, AbstractListModel, DefaultListModel, CallableListModel } from './listModel.js';
export type { TitleFunction, ListProducer, ListData } from './listModel.js';

export { Controller } from './controller.js';
export type { ControllerOptions, FormFunction } from './controller.js';

export {
  CONTROLLER_FORMAT_VERSION,
  packedControlSchema,
  packedControllerSchema,
} from './packed.js';
export type {
  PackedControl,
  PackedController,
  PackedTextField,
  PackedComboBox,
  PackedSlider,
  PackedFileUpload,
  PackedApply,
  PackedListData,
} from './packed.js';
export { packController, unpackController, unpackControl } from './serialization.js';
