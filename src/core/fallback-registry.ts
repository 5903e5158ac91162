/**
 * Fallback Registry
 *
 * Static table of substitute renderables per component kind. Every kind has a
 * builder for every fallback style; the `Record` types make a gap a compile
 * error. Unknown kinds get the generic placeholder.
 */

import { RenderNode, Renderable } from '../types/common';
import { ComponentTier, GlassTier } from './degradation-tiers';
import { createLogger } from '../utils/logger';

// ============= INTERFACES & TYPES =============

export const COMPONENT_KINDS = [
  'toggle-switch',
  'glass-card',
  'glass-background',
  'glass-dialog',
  'settings-panel',
  'menu-container'
] as const;

export type ComponentKind = (typeof COMPONENT_KINDS)[number];

/**
 * How far a substitute strips the original down.
 */
export type FallbackStyle = 'substitute' | 'emergency' | 'unavailable';

type BuildableStyle = Exclude<FallbackStyle, 'unavailable'>;

interface BuildInput {
  componentId: string;
  previous?: RenderNode;
}

type FallbackBuilder = (input: BuildInput) => RenderNode;

export const COMPONENT_TIER_STYLE: Record<ComponentTier, FallbackStyle> = {
  normal: 'substitute',
  reduced: 'substitute',
  fallback: 'substitute',
  emergency: 'emergency',
  failed: 'unavailable'
};

export const GLASS_TIER_STYLE: Record<GlassTier, FallbackStyle> = {
  full: 'substitute',
  reduced: 'substitute',
  minimal: 'emergency',
  none: 'unavailable'
};

export const PALETTE = {
  darkerGray: '#aaaaaa',
  backgroundDark: '#101010',
  black: '#000000',
  white: '#ffffff',
  secondaryText: '#bebebe',
  tertiaryText: '#808080',
  error: '#ff4444'
} as const;

const log = createLogger('FallbackRegistry');

// ============= BUILDERS =============

function previousToggle(previous?: RenderNode): { checked: boolean; enabled: boolean } {
  if (previous?.type === 'toggle') {
    return { checked: previous.checked, enabled: previous.enabled };
  }
  return { checked: false, enabled: true };
}

function container(padding: number, background: string, children: RenderNode[] = []): RenderNode {
  return { type: 'container', orientation: 'vertical', padding, background, children };
}

const FALLBACK_TABLE: Record<ComponentKind, Record<BuildableStyle, FallbackBuilder>> = {
  'toggle-switch': {
    substitute: ({ previous }) => ({ type: 'toggle', ...previousToggle(previous), focusable: true }),
    emergency: ({ previous }) => ({
      type: 'toggle',
      checked: previousToggle(previous).checked,
      enabled: true,
      focusable: true,
      label: 'Toggle'
    })
  },
  'glass-card': {
    // children of the failed card move into the substitute
    substitute: ({ previous }) =>
      container(12, PALETTE.darkerGray, previous?.type === 'container' ? [...previous.children] : []),
    emergency: () => container(8, PALETTE.backgroundDark)
  },
  'glass-background': {
    substitute: () => ({ type: 'surface', background: PALETTE.darkerGray, alpha: 0.8 }),
    emergency: () => ({ type: 'surface', background: PALETTE.backgroundDark, alpha: 1 })
  },
  'glass-dialog': {
    substitute: () => container(16, PALETTE.darkerGray),
    emergency: () => container(8, PALETTE.backgroundDark)
  },
  'settings-panel': {
    substitute: () =>
      container(24, PALETTE.backgroundDark, [
        { type: 'text', text: 'Settings', color: PALETTE.white, size: 20, padding: 8 },
        {
          type: 'text',
          text: 'Some settings are shown in a simplified form.',
          color: PALETTE.secondaryText,
          size: 14,
          padding: 8
        }
      ]),
    emergency: () => ({
      type: 'text',
      text: 'Settings unavailable. Press BACK to return.',
      color: PALETTE.white,
      size: 16,
      padding: 32,
      background: PALETTE.backgroundDark
    })
  },
  'menu-container': {
    substitute: () => container(16, PALETTE.backgroundDark),
    emergency: () => container(8, PALETTE.black)
  }
};

const GENERIC_BUILDERS: Record<BuildableStyle, FallbackBuilder> = {
  substitute: ({ componentId }) => ({
    type: 'text',
    text: `${componentId} (Fallback)`,
    color: PALETTE.secondaryText,
    size: 14,
    padding: 8
  }),
  emergency: () => ({ type: 'text', text: 'Component unavailable', color: PALETTE.tertiaryText, size: 14, padding: 4 })
};

// ============= PUBLIC API =============

/**
 * Component ids are `kind` or `kind:instance`.
 */
export function componentKindOf(componentId: string): ComponentKind | null {
  const prefix = componentId.split(':', 1)[0].toLowerCase();
  return COMPONENT_KINDS.find(kind => kind === prefix) ?? null;
}

export function unavailablePlaceholder(componentId: string, tier: string): Renderable {
  return {
    componentId,
    tier,
    source: 'placeholder',
    mutatesTree: true,
    inert: true,
    node: {
      type: 'text',
      text: `${componentId} unavailable`,
      color: PALETTE.tertiaryText,
      size: 14,
      padding: 8,
      background: PALETTE.backgroundDark
    }
  };
}

/**
 * Placeholder shown when the UI tree must not be touched: the host overlays
 * it without committing a transaction.
 */
export function statusMessage(componentId: string, tier: string): Renderable {
  return {
    componentId,
    tier,
    source: 'placeholder',
    mutatesTree: false,
    inert: true,
    node: {
      type: 'text',
      text: `${componentId} is temporarily unavailable`,
      color: PALETTE.secondaryText,
      size: 14,
      padding: 8
    }
  };
}

export function emergencyFallback(componentId: string, tier: string): Renderable {
  return {
    componentId,
    tier,
    source: 'fallback',
    mutatesTree: true,
    inert: true,
    node: {
      type: 'text',
      text: `Error: ${componentId} failed`,
      color: PALETTE.error,
      size: 14,
      padding: 8,
      background: PALETTE.backgroundDark
    }
  };
}

export function synthesizeFallback(
  componentId: string,
  tier: string,
  style: FallbackStyle,
  previous?: RenderNode
): Renderable {
  if (style === 'unavailable') {
    return unavailablePlaceholder(componentId, tier);
  }

  const kind = componentKindOf(componentId);
  const builder = kind ? FALLBACK_TABLE[kind][style] : GENERIC_BUILDERS[style];
  try {
    return { componentId, tier, source: 'fallback', mutatesTree: true, inert: false, node: builder({ componentId, previous }) };
  } catch (error) {
    log.error(`Fallback builder for ${componentId} threw, using emergency fallback`, error);
    return emergencyFallback(componentId, tier);
  }
}
