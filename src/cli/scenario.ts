import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { HostEnvironment, Renderable, ResourceDescriptor, RetryFn } from '../types/common';
import {
  ComponentRenderError,
  ConfigValidationError,
  IllegalStateError,
  NotAttachedError,
  OutOfMemoryError,
  ResourceNotFoundError,
  ScopeDestroyedError,
  StateLossError
} from '../core/errors';
import { EngineConfigSchema, formatIssues } from '../utils/config';
import { ResilienceEngine } from '../core/resilience-engine';

// ============= SCHEMA =============

const ScenarioErrorSchema = z.object({
  name: z.string().default('Error'),
  message: z.string().min(1),
  code: z.string().optional()
});

const ScenarioFailureSchema = z.object({
  componentId: z.string().min(1),
  domain: z.enum(['component', 'glass']).default('component'),
  context: z.string().optional(),
  error: ScenarioErrorSchema,
  /** what the retry callback does when the engine calls it */
  retry: z.enum(['none', 'succeed', 'fail', 'throw']).default('none')
});

export const ScenarioSchema = z.object({
  name: z.string().default('unnamed scenario'),
  missing: z.array(z.string()).default([]),
  /** names that resolve but throw on load */
  brokenLoads: z.array(z.string()).default([]),
  capability: z.boolean().default(true),
  environment: z
    .object({
      scopeFinishing: z.boolean().default(false),
      scopeDestroyed: z.boolean().default(false),
      managerDestroyed: z.boolean().default(false),
      stateSaved: z.boolean().default(false)
    })
    .default({}),
  failures: z.array(ScenarioFailureSchema).default([]),
  config: EngineConfigSchema.partial().optional()
});

export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioInput = z.input<typeof ScenarioSchema>;
export type ScenarioFailure = z.infer<typeof ScenarioFailureSchema>;

export interface ReplayOutcome {
  componentId: string;
  domain: 'component' | 'glass';
  tier: string;
  source: Renderable['source'];
  inert: boolean;
}

// ============= LOADING =============

export function parseScenario(raw: unknown, source = 'scenario'): Scenario {
  const parsed = ScenarioSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

export async function loadScenario(file: string): Promise<Scenario> {
  const target = path.resolve(file);
  if (!(await fs.pathExists(target))) {
    throw new ConfigValidationError(target, ['file does not exist']);
  }
  let raw: unknown;
  try {
    raw = await fs.readJson(target);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(target, [`not valid JSON (${reason})`]);
  }
  return parseScenario(raw, target);
}

// ============= HOST =============

/**
 * In-process host: everything resolves except the names the scenario lists.
 */
export function createScenarioHost(scenario: Scenario): HostEnvironment {
  const missing = new Set(scenario.missing);
  const broken = new Set(scenario.brokenLoads);
  return {
    environmentState: () => ({ ...scenario.environment }),
    capabilityProbe: () => scenario.capability,
    resolve: (descriptor: ResourceDescriptor) => (missing.has(descriptor.name) ? null : { descriptor }),
    load: handle => {
      if (broken.has(handle.descriptor.name)) {
        throw new ResourceNotFoundError(handle.descriptor.name, handle.descriptor.kind);
      }
      return handle.descriptor.name;
    }
  };
}

export function buildError(entry: ScenarioFailure['error'], componentId = 'component'): Error {
  switch (entry.name) {
    case 'ResourceNotFoundError':
      return new ResourceNotFoundError(entry.message);
    case 'IllegalStateError':
      return new IllegalStateError(entry.message);
    case 'StateLossError':
      return new StateLossError(entry.message);
    case 'NotAttachedError':
      return new NotAttachedError(componentId);
    case 'ScopeDestroyedError':
      return new ScopeDestroyedError(entry.message);
    case 'ComponentRenderError':
      return new ComponentRenderError(componentId, entry.message);
    case 'OutOfMemoryError':
      return new OutOfMemoryError(entry.message);
    default: {
      const error = new Error(entry.message);
      error.name = entry.name;
      return entry.code ? Object.assign(error, { code: entry.code }) : error;
    }
  }
}

function retryFor(entry: ScenarioFailure): RetryFn | undefined {
  switch (entry.retry) {
    case 'none':
      return undefined;
    case 'succeed':
      return ({ componentId, tier }) => ({
        componentId,
        tier,
        source: 'live',
        mutatesTree: true,
        inert: false,
        node: { type: 'text', text: componentId, color: '#ffffff', size: 14, padding: 8 }
      });
    case 'fail':
      return () => null;
    case 'throw':
      return () => {
        throw new Error(`${entry.componentId} retry failed`);
      };
  }
}

/**
 * Feed every failure of the scenario through the engine, in order.
 */
export function replayScenario(engine: ResilienceEngine, scenario: Scenario): ReplayOutcome[] {
  return scenario.failures.map(failure => {
    const error = buildError(failure.error, failure.componentId);
    const retryFn = retryFor(failure);
    const options = { context: failure.context };
    const rendered =
      failure.domain === 'glass'
        ? engine.onGlassFailure(failure.componentId, error, retryFn, options)
        : engine.onFailure(failure.componentId, error, retryFn, options);
    return {
      componentId: failure.componentId,
      domain: failure.domain,
      tier: rendered.tier,
      source: rendered.source,
      inert: rendered.inert
    };
  });
}
