/**
 * Packed form of a Controller: controls by value, parents by id
 */

import { Apply } from './apply.js';
import { ComboBox } from './comboBox.js';
import type { Control } from './control.js';
import { Controller } from './controller.js';
import { ConfigurationError } from './errors.js';
import { FileUpload } from './fileUpload.js';
import {
  CONTROLLER_FORMAT_VERSION,
  packedControllerSchema,
  type PackedControl,
  type PackedController,
} from './packed.js';
import { formatZodError } from './schema.js';
import { Slider } from './slider.js';
import { TextField } from './textField.js';

export function packController(controller: Controller): PackedController {
  return {
    version: CONTROLLER_FORMAT_VERSION,
    invalidation: controller.invalidation,
    parameters: [...controller.parameters],
    controls: controller.controls().map((control) => control.pack()),
  };
}

export function unpackControl(record: PackedControl): Control {
  switch (record.kind) {
    case 'TextField':
      return TextField.unpack(record);
    case 'ComboBox':
      return ComboBox.unpack(record);
    case 'Slider':
      return Slider.unpack(record);
    case 'FileUpload':
      return FileUpload.unpack(record);
    case 'Apply':
      return Apply.unpack(record);
  }
}

/**
 * Rebuild a controller from its packed form (validated first)
 */
export function unpackController(record: unknown): Controller {
  const parsed = packedControllerSchema.safeParse(record);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid controller: ${formatZodError(parsed.error)}`);
  }
  const { invalidation, parameters, controls } = parsed.data;
  return new Controller(controls.map(unpackControl), { invalidation, parameters });
}
