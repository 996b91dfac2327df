/**
 * Error taxonomy
 */

export class FormError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Encode or construction time mismatch. Never retried.
 */
export class ConfigurationError extends FormError {}

/**
 * A view was rejected by a control; the control state is unchanged
 */
export class ValidationError extends FormError {
  readonly controlId: string;

  constructor(controlId: string, cause: unknown) {
    super(`Control "${controlId}": ${describe(cause)}`, { cause });
    this.controlId = controlId;
  }
}

/**
 * A control's update function threw
 */
export class UpdateError extends FormError {
  readonly controlId: string;

  constructor(controlId: string, cause: unknown) {
    super(`Update of control "${controlId}" failed: ${describe(cause)}`, { cause });
    this.controlId = controlId;
  }
}

export class UnknownControlError extends FormError {
  readonly controlId: string;

  constructor(controlId: string) {
    super(`Unknown control: ${controlId}`);
    this.controlId = controlId;
  }
}

export class NoSuchModuleError extends ConfigurationError {
  readonly module: string;

  constructor(module: string) {
    super(`Module ${module} not found`);
    this.module = module;
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Render an error with its cause chain (used for execution logs)
 */
export function formatError(err: unknown): string {
  const sections: string[] = [];
  let current: unknown = err;
  const seen = new Set<unknown>();

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    const text = current instanceof Error ? current.stack ?? `${current.name}: ${current.message}` : String(current);
    sections.push(sections.length === 0 ? text : `Caused by: ${text}`);
    current = current instanceof Error ? current.cause : undefined;
  }

  return sections.join('\n');
}
