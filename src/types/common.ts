/**
 * Common type definitions shared by the engine and its host.
 */

// ============= RESOURCES =============

export type ResourceKind = 'visual' | 'layout' | 'color' | 'dimension';

export const RESOURCE_KINDS: readonly ResourceKind[] = ['visual', 'layout', 'color', 'dimension'];

export interface ResourceDescriptor<Name extends string = string> {
  readonly name: Name;
  readonly kind: ResourceKind;
}

/**
 * Replacement for a missing resource. Layouts are structural and have none.
 */
export type ResourceFallback =
  | { readonly kind: 'visual'; readonly replacement: string }
  | { readonly kind: 'color'; readonly value: string }
  | { readonly kind: 'dimension'; readonly dp: number };

/**
 * Opaque handle returned by the host when a resource name resolves.
 */
export interface ResourceHandle {
  readonly descriptor: ResourceDescriptor;
  readonly ref?: unknown;
}

export interface ResourceEnvironment {
  /** null when the name does not resolve in the current environment */
  resolve(descriptor: ResourceDescriptor): ResourceHandle | null;
  /** may throw; a throw means the resource is unusable */
  load(handle: ResourceHandle): unknown;
}

// ============= HOST ENVIRONMENT =============

/**
 * Snapshot of the owning scope (the screen a component lives in).
 */
export interface EnvironmentState {
  scopeFinishing: boolean;
  scopeDestroyed: boolean;
  managerDestroyed: boolean;
  stateSaved: boolean;
}

export interface DeviceSnapshot {
  platform: string;
  arch: string;
  release: string;
  runtimeVersion: string;
  hostname?: string;
  totalMemoryMB: number;
  availableMemoryMB: number;
  cpuCount: number;
}

export interface HostEnvironment extends ResourceEnvironment {
  environmentState(): EnvironmentState;
  /** whether the platform supports advanced rendering effects (blur etc.) */
  capabilityProbe(): boolean;
  /** drop whatever the UI layer holds for a component; used by forced cleanup */
  releaseComponent?(componentId: string): void;
  deviceSnapshot?(): DeviceSnapshot | Promise<DeviceSnapshot>;
}

// ============= RENDERABLES =============

export type RenderNode =
  | {
      type: 'container';
      orientation: 'vertical';
      padding: number;
      background: string;
      children: RenderNode[];
    }
  | {
      type: 'toggle';
      checked: boolean;
      enabled: boolean;
      focusable: boolean;
      label?: string;
    }
  | {
      type: 'surface';
      background: string;
      alpha: number;
    }
  | {
      type: 'text';
      text: string;
      color: string;
      size: number;
      padding: number;
      background?: string;
    };

export type RenderSource = 'live' | 'retry' | 'fallback' | 'placeholder';

/**
 * What the engine hands back to the UI layer in place of a failed component.
 */
export interface Renderable {
  componentId: string;
  tier: string;
  source: RenderSource;
  /** true when showing it means swapping a node in the live UI tree */
  mutatesTree: boolean;
  /** true for "unavailable" placeholders that accept no interaction */
  inert: boolean;
  node: RenderNode;
}

export interface RetryContext {
  componentId: string;
  attempt: number;
  tier: string;
  /** the commit may go through even though UI state was already saved */
  allowStateLoss: boolean;
}

export type RetryFn = (context: RetryContext) => Renderable | null;

export interface FailureOptions {
  /** free-form operation name recorded with the crash record */
  context?: string;
  /** last node the component rendered, used to carry state into the fallback */
  previous?: RenderNode;
  /** receives the result of a delayed retry */
  onDeferred?: (result: Renderable) => void;
}
