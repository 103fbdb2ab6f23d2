import { UnsupportedDesignError } from '../errors.js';
import type { Canvas } from '../canvas/compose.js';
import type { QrRequest } from '../qr/symbol.js';
import { composeDesign } from './compose.js';
import { LAYOUTS, type DesignId, type DesignLayout, type TextFields } from './layouts.js';

export { composeDesign } from './compose.js';
export { LAYOUTS, TEXT_SLOTS } from './layouts.js';
export type { DesignId, DesignLayout, TextFields, TextSlot } from './layouts.js';

export const DESIGN_IDS: readonly DesignId[] = ['flat-small', 'flat-large', 'card'];

// Names accepted for compatibility with earlier releases of the tool
const DESIGN_ALIASES: ReadonlyMap<string, DesignId> = new Map<string, DesignId>([
  ['custom-card', 'card'],
  ['custom', 'card'],
  ['multicolored', 'flat-small'],
  ['google', 'flat-large'],
]);

export const SUPPORTED_DESIGNS: readonly string[] = [...DESIGN_IDS, ...DESIGN_ALIASES.keys()];

function isDesignId(value: string): value is DesignId {
  return DESIGN_IDS.some(id => id === value);
}

/**
 * Map a design name or alias to its canonical id.
 */
export function canonicalDesignId(design: string): DesignId {
  const name = design.trim().toLowerCase();
  if (isDesignId(name)) {
    return name;
  }
  const alias = DESIGN_ALIASES.get(name);
  if (alias) {
    return alias;
  }
  throw new UnsupportedDesignError(design, SUPPORTED_DESIGNS);
}

export function resolveDesign(design: string): DesignLayout {
  return LAYOUTS[canonicalDesignId(design)];
}

/**
 * Render a design by name. Unknown names fail before the symbol is generated.
 */
export async function renderDesign(
  design: string,
  request: QrRequest,
  texts: Partial<TextFields> = {}
): Promise<Canvas> {
  const layout = resolveDesign(design);
  return composeDesign(layout, request, {
    title: texts.title ?? '',
    subtitle: texts.subtitle ?? '',
    footer: texts.footer ?? '',
  });
}
