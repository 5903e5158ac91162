/**
 * Error Classifier
 *
 * Two views of the same failure: the crash type recorded in the diagnostic
 * ledger, and the failure mode that picks a retry strategy. Both look at the
 * error's `code` first and fall back to message keywords.
 */

import { errorCodeOf } from './errors';

export enum CrashType {
  RESOURCE_NOT_FOUND = 'ResourceNotFound',
  FRAGMENT_LIFECYCLE_ERROR = 'FragmentLifecycleError',
  CUSTOM_COMPONENT_FAILURE = 'CustomComponentFailure',
  MEMORY_ERROR = 'MemoryError',
  DOMAIN_SPECIFIC_ERROR = 'DomainSpecificError',
  UNKNOWN = 'Unknown'
}

export enum FailureMode {
  STATE_LOSS = 'StateLoss',
  NOT_ATTACHED = 'NotAttached',
  LIFECYCLE_ERROR = 'LifecycleError',
  ILLEGAL_STATE = 'IllegalState',
  UNKNOWN = 'Unknown'
}

export const DEFAULT_DOMAIN_KEYWORDS: readonly string[] = ['settings', 'glass'];

const LIFECYCLE_KEYWORDS = ['fragment', 'lifecycle', 'detached', 'destroyed', 'not attached'];
const COMPONENT_KEYWORDS = ['view', 'component', 'render'];
const MEMORY_KEYWORDS = ['out of memory', 'heap', 'allocation failed'];

const CRASH_TYPE_BY_CODE: Record<string, CrashType> = {
  RESOURCE_NOT_FOUND: CrashType.RESOURCE_NOT_FOUND,
  OUT_OF_MEMORY: CrashType.MEMORY_ERROR,
  COMPONENT_RENDER_FAILED: CrashType.CUSTOM_COMPONENT_FAILURE,
  NOT_ATTACHED: CrashType.FRAGMENT_LIFECYCLE_ERROR,
  SCOPE_DESTROYED: CrashType.FRAGMENT_LIFECYCLE_ERROR,
  STATE_LOSS: CrashType.FRAGMENT_LIFECYCLE_ERROR
};

const FAILURE_MODE_BY_CODE: Record<string, FailureMode> = {
  STATE_LOSS: FailureMode.STATE_LOSS,
  NOT_ATTACHED: FailureMode.NOT_ATTACHED,
  SCOPE_DESTROYED: FailureMode.LIFECYCLE_ERROR,
  ILLEGAL_STATE: FailureMode.ILLEGAL_STATE
};

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message.toLowerCase();
  }
  return String(error).toLowerCase();
}

function nameOf(error: unknown): string {
  return error instanceof Error ? error.name : '';
}

export class ErrorClassifier {
  /**
   * Crash type for the diagnostic ledger. `context` is the operation name the
   * failure happened in; domain keywords are matched against it.
   */
  static classifyCrash(
    error: unknown,
    context = '',
    domainKeywords: readonly string[] = DEFAULT_DOMAIN_KEYWORDS
  ): CrashType {
    const code = errorCodeOf(error);
    if (code !== undefined && code in CRASH_TYPE_BY_CODE) {
      return CRASH_TYPE_BY_CODE[code];
    }

    const message = messageOf(error);
    const name = nameOf(error);

    if (name === 'ResourceNotFoundError' || message.includes('resource not found')) {
      return CrashType.RESOURCE_NOT_FOUND;
    }
    if (LIFECYCLE_KEYWORDS.some(keyword => message.includes(keyword))) {
      return CrashType.FRAGMENT_LIFECYCLE_ERROR;
    }
    if (COMPONENT_KEYWORDS.some(keyword => message.includes(keyword))) {
      return CrashType.CUSTOM_COMPONENT_FAILURE;
    }
    if (name === 'OutOfMemoryError' || MEMORY_KEYWORDS.some(keyword => message.includes(keyword))) {
      return CrashType.MEMORY_ERROR;
    }

    const lowerContext = context.toLowerCase();
    if (domainKeywords.some(keyword => lowerContext.includes(keyword.toLowerCase()))) {
      return CrashType.DOMAIN_SPECIFIC_ERROR;
    }
    return CrashType.UNKNOWN;
  }

  /**
   * Failure mode that selects the recovery strategy.
   */
  static classifyFailure(error: unknown): FailureMode {
    const code = errorCodeOf(error);
    if (code !== undefined && code in FAILURE_MODE_BY_CODE) {
      return FAILURE_MODE_BY_CODE[code];
    }

    const message = messageOf(error);
    if (message.includes('state loss') || message.includes('state saved')) {
      return FailureMode.STATE_LOSS;
    }
    if (message.includes('not attached')) {
      return FailureMode.NOT_ATTACHED;
    }
    if (message.includes('destroyed')) {
      return FailureMode.LIFECYCLE_ERROR;
    }
    if (nameOf(error) === 'IllegalStateError') {
      return FailureMode.ILLEGAL_STATE;
    }
    return FailureMode.UNKNOWN;
  }
}
