/**
 * Resource Catalogs
 *
 * Named resources the two built-in screens depend on, with the fallback each
 * missing resource maps to. The catalogs are typed with `as const` so that
 * the fallback tables are checked for exhaustiveness at compile time.
 */

import { ResourceDescriptor, ResourceFallback } from '../types/common';

// ============= SETTINGS SCREEN =============

export const SETTINGS_VISUALS = [
  'modern_toggle_track_animated',
  'modern_toggle_thumb',
  'modern_toggle_thumb_focused'
] as const;

export const SETTINGS_LAYOUTS = [
  'setting',
  'glass_card_preferences',
  'glass_card_configuration',
  'glass_card_actions'
] as const;

export const SETTINGS_COLORS = [
  'focus',
  'glass_border_focused',
  'glass_card_background_focused',
  'glass_border',
  'glass_card_background',
  'glass_highlight_focused',
  'info_text_primary',
  'info_text_secondary',
  'white'
] as const;

export const SETTINGS_DIMENSIONS = ['tv_min_touch_target', 'tv_text_size_medium', 'toggle_padding'] as const;

export type SettingsResourceName =
  | (typeof SETTINGS_VISUALS)[number]
  | (typeof SETTINGS_LAYOUTS)[number]
  | (typeof SETTINGS_COLORS)[number]
  | (typeof SETTINGS_DIMENSIONS)[number];

export const SETTINGS_RESOURCES: readonly ResourceDescriptor<SettingsResourceName>[] = [
  ...SETTINGS_VISUALS.map(name => ({ name, kind: 'visual' as const })),
  ...SETTINGS_LAYOUTS.map(name => ({ name, kind: 'layout' as const })),
  ...SETTINGS_COLORS.map(name => ({ name, kind: 'color' as const })),
  ...SETTINGS_DIMENSIONS.map(name => ({ name, kind: 'dimension' as const }))
];

/**
 * Platform-default substitutes. Layouts have no entry.
 */
export const SETTINGS_FALLBACKS: Partial<Record<SettingsResourceName, ResourceFallback>> = {
  modern_toggle_track_animated: { kind: 'visual', replacement: 'btn_default' },
  modern_toggle_thumb: { kind: 'visual', replacement: 'btn_default' },
  modern_toggle_thumb_focused: { kind: 'visual', replacement: 'btn_default' },

  focus: { kind: 'color', value: '#33b5e5' },
  glass_border_focused: { kind: 'color', value: '#ffffff' },
  glass_card_background_focused: { kind: 'color', value: '#555555' },
  glass_border: { kind: 'color', value: '#bebebe' },
  glass_card_background: { kind: 'color', value: '#101010' },
  glass_highlight_focused: { kind: 'color', value: '#33b5e5' },
  info_text_primary: { kind: 'color', value: '#ffffff' },
  info_text_secondary: { kind: 'color', value: '#bebebe' },
  white: { kind: 'color', value: '#ffffff' },

  tv_min_touch_target: { kind: 'dimension', dp: 48 },
  tv_text_size_medium: { kind: 'dimension', dp: 16 },
  toggle_padding: { kind: 'dimension', dp: 8 }
};

// ============= GLASS SUBSYSTEM =============

export const GLASS_VISUALS = [
  'glass_menu_background',
  'glass_panel_background',
  'glass_item_background',
  'glass_item_focused',
  'glass_item_moving',
  'glass_card_background',
  'glass_card_focused',
  'glass_card_selector',
  'glassmorphism_overlay',
  'blur_background'
] as const;

export const GLASS_COLORS = [
  'glass_background',
  'glass_background_focused',
  'glass_border',
  'glass_border_focused',
  'glass_text_primary',
  'glass_text_secondary',
  'glass_highlight',
  'glass_highlight_focused',
  'glass_shadow'
] as const;

export const GLASS_DIMENSIONS = [
  'glass_corner_radius',
  'glass_elevation',
  'glass_blur_radius',
  'glass_border_width',
  'glass_card_padding',
  'glass_card_margin',
  'glass_card_elevation',
  'glass_text_size_large',
  'glass_text_size_medium',
  'glass_text_size_small',
  'glass_text_size_caption'
] as const;

export type GlassResourceName =
  | (typeof GLASS_VISUALS)[number]
  | (typeof GLASS_COLORS)[number]
  | (typeof GLASS_DIMENSIONS)[number];

/**
 * Every glass resource has a fallback; the Record type enforces it.
 */
export const GLASS_FALLBACKS = {
  glass_menu_background: { kind: 'visual', replacement: 'menu_panel_bg' },
  glass_panel_background: { kind: 'visual', replacement: 'tv_panel_bg' },
  glass_item_background: { kind: 'visual', replacement: 'list_item_bg' },
  glass_item_focused: { kind: 'visual', replacement: 'focus_background' },
  glass_item_moving: { kind: 'visual', replacement: 'focus_background' },
  glass_card_background: { kind: 'visual', replacement: 'simple_card_background' },
  glass_card_focused: { kind: 'visual', replacement: 'focus_background' },
  glass_card_selector: { kind: 'visual', replacement: 'simple_card_background' },
  glassmorphism_overlay: { kind: 'visual', replacement: 'screen_background_dark_transparent' },
  blur_background: { kind: 'visual', replacement: 'screen_background_dark' },

  glass_background: { kind: 'color', value: '#101010' },
  glass_background_focused: { kind: 'color', value: '#555555' },
  glass_border: { kind: 'color', value: '#bebebe' },
  glass_border_focused: { kind: 'color', value: '#ffffff' },
  glass_text_primary: { kind: 'color', value: '#ffffff' },
  glass_text_secondary: { kind: 'color', value: '#bebebe' },
  glass_highlight: { kind: 'color', value: '#00ddff' },
  glass_highlight_focused: { kind: 'color', value: '#33b5e5' },
  glass_shadow: { kind: 'color', value: '#000000' },

  glass_corner_radius: { kind: 'dimension', dp: 8 },
  glass_elevation: { kind: 'dimension', dp: 4 },
  glass_blur_radius: { kind: 'dimension', dp: 25 },
  glass_border_width: { kind: 'dimension', dp: 1 },
  glass_card_padding: { kind: 'dimension', dp: 16 },
  glass_card_margin: { kind: 'dimension', dp: 8 },
  glass_card_elevation: { kind: 'dimension', dp: 6 },
  glass_text_size_large: { kind: 'dimension', dp: 20 },
  glass_text_size_medium: { kind: 'dimension', dp: 16 },
  glass_text_size_small: { kind: 'dimension', dp: 14 },
  glass_text_size_caption: { kind: 'dimension', dp: 12 }
} satisfies Record<GlassResourceName, ResourceFallback>;

/**
 * Catalog shape accepted by DomainResourceValidator.
 */
export interface DomainCatalog<Name extends string> {
  visual: readonly Name[];
  color: readonly Name[];
  dimension: readonly Name[];
  fallbacks: Record<Name, ResourceFallback>;
}

export const GLASS_CATALOG: DomainCatalog<GlassResourceName> = {
  visual: GLASS_VISUALS,
  color: GLASS_COLORS,
  dimension: GLASS_DIMENSIONS,
  fallbacks: GLASS_FALLBACKS
};
