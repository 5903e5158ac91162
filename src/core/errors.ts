/**
 * Error classes hosts throw from initialization paths, and that the
 * classifiers recognise by `code` as well as by message.
 */

export type EngineErrorCode =
  | 'RESOURCE_NOT_FOUND'
  | 'ILLEGAL_STATE'
  | 'STATE_LOSS'
  | 'NOT_ATTACHED'
  | 'SCOPE_DESTROYED'
  | 'COMPONENT_RENDER_FAILED'
  | 'OUT_OF_MEMORY'
  | 'CONFIG_INVALID';

export class EngineError extends Error {
  constructor(message: string, readonly code: EngineErrorCode) {
    super(message);
    this.name = 'EngineError';
  }
}

export class ResourceNotFoundError extends EngineError {
  constructor(readonly resourceName: string, kind?: string) {
    super(`Resource not found: ${kind ? `${kind}/` : ''}${resourceName}`, 'RESOURCE_NOT_FOUND');
    this.name = 'ResourceNotFoundError';
  }
}

export class IllegalStateError extends EngineError {
  constructor(message: string) {
    super(message, 'ILLEGAL_STATE');
    this.name = 'IllegalStateError';
  }
}

export class StateLossError extends EngineError {
  constructor(message = 'Can not perform this action after state loss') {
    super(message, 'STATE_LOSS');
    this.name = 'StateLossError';
  }
}

export class NotAttachedError extends EngineError {
  constructor(componentId: string) {
    super(`Component ${componentId} not attached to a scope`, 'NOT_ATTACHED');
    this.name = 'NotAttachedError';
  }
}

export class ScopeDestroyedError extends EngineError {
  constructor(message = 'Owning scope has been destroyed') {
    super(message, 'SCOPE_DESTROYED');
    this.name = 'ScopeDestroyedError';
  }
}

export class ComponentRenderError extends EngineError {
  constructor(readonly componentId: string, reason: string) {
    super(`Component ${componentId} failed to render: ${reason}`, 'COMPONENT_RENDER_FAILED');
    this.name = 'ComponentRenderError';
  }
}

export class OutOfMemoryError extends EngineError {
  constructor(message = 'Out of memory while allocating render resources') {
    super(message, 'OUT_OF_MEMORY');
    this.name = 'OutOfMemoryError';
  }
}

/**
 * Raised at the configuration/scenario boundary only.
 */
export class ConfigValidationError extends EngineError {
  constructor(readonly source: string, readonly issues: string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

/**
 * Normalise anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof EngineError) {
    return error.code;
  }
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
