import { rgb, withAlpha, type Rgba } from '../canvas/color.js';
import type { ColorMode } from '../canvas/compose.js';
import type { SymbolColors } from '../qr/symbol.js';
import type { FontSpec } from '../text/fonts.js';

export type DesignId = 'flat-small' | 'flat-large' | 'card';

export type TextSlot = 'title' | 'subtitle' | 'footer';

export const TEXT_SLOTS: readonly TextSlot[] = ['title', 'subtitle', 'footer'];

export type TextFields = Record<TextSlot, string>;

/**
 * Distance along one axis: absolute pixels, pixels back from the far edge,
 * or a fraction of the canvas extent (floored).
 */
export type Offset = number | { fromEnd: number } | { fraction: number };

export interface TextSlotLayout {
  font: FontSpec;
  color: Rgba;
  /** 'center' uses the measured width of the text */
  x: Offset | 'center';
  y: Offset;
}

/** Box expressed as fractions of the canvas edges */
export interface FractionBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export type BackgroundLayer =
  | { kind: 'rect'; box: FractionBox; color: Rgba }
  | { kind: 'gradient'; color: Rgba; attenuation: number };

export type CanvasSizing =
  | { kind: 'fixed'; size: number }
  | { kind: 'fromSymbol'; margin: number; widthRatio: number; heightRatio: number };

export type SymbolPlacement =
  | { kind: 'scaled'; ratio: number }
  | { kind: 'card'; padding: number; radius: number; offsetY: number; color: Rgba };

export interface DesignLayout {
  id: DesignId;
  canvas: CanvasSizing;
  mode: ColorMode;
  fill: Rgba;
  symbol: SymbolColors;
  background: readonly BackgroundLayer[];
  placement: SymbolPlacement;
  text: Record<TextSlot, TextSlotLayout>;
  /** Unsharp factor applied last; omitted means no sharpening */
  sharpen?: number;
}

export const PALETTE = {
  blue: rgb(66, 133, 244),
  red: rgb(234, 67, 53),
  yellow: rgb(251, 188, 5),
  green: rgb(52, 168, 83),
  white: rgb(255, 255, 255),
  black: rgb(0, 0, 0),
  night: rgb(2, 4, 10),
  cyan: rgb(0, 230, 255),
  teal: rgb(0, 200, 230),
} as const;

// Drawn in this order; corners belong to whichever panel comes later
const QUARTER_PANELS: readonly BackgroundLayer[] = [
  { kind: 'rect', box: { left: 0, top: 0, right: 1, bottom: 0.25 }, color: PALETTE.blue },
  { kind: 'rect', box: { left: 0, top: 0, right: 0.25, bottom: 1 }, color: PALETTE.red },
  { kind: 'rect', box: { left: 0.75, top: 0, right: 1, bottom: 1 }, color: PALETTE.yellow },
  { kind: 'rect', box: { left: 0, top: 0.75, right: 1, bottom: 1 }, color: PALETTE.green },
];

const FLAT_SYMBOL: SymbolColors = { dark: PALETTE.blue, light: PALETTE.white };

export const LAYOUTS: Readonly<Record<DesignId, DesignLayout>> = {
  'flat-small': {
    id: 'flat-small',
    canvas: { kind: 'fixed', size: 500 },
    mode: 'rgb',
    fill: PALETTE.white,
    symbol: FLAT_SYMBOL,
    background: QUARTER_PANELS,
    placement: { kind: 'scaled', ratio: 0.5 },
    text: {
      title: { font: { file: 'CaviarDreams.fnt', size: 40 }, color: PALETTE.white, x: 10, y: 10 },
      subtitle: { font: { file: 'ORGANICAL.fnt', size: 50 }, color: PALETTE.black, x: 20, y: 90 },
      footer: { font: { file: 'CaviarDreams.fnt', size: 40 }, color: PALETTE.white, x: 60, y: { fromEnd: 110 } },
    },
  },

  'flat-large': {
    id: 'flat-large',
    canvas: { kind: 'fixed', size: 800 },
    mode: 'rgb',
    fill: PALETTE.white,
    symbol: FLAT_SYMBOL,
    background: QUARTER_PANELS,
    placement: { kind: 'scaled', ratio: 0.5 },
    text: {
      title: { font: { file: 'PatchworkStitchlings.fnt', size: 50 }, color: PALETTE.white, x: 10, y: 10 },
      subtitle: { font: { file: 'ORGANICAL.fnt', size: 50 }, color: PALETTE.white, x: 20, y: 110 },
      footer: {
        font: { file: 'PatchworkStitchlings.fnt', size: 40 },
        color: PALETTE.white,
        x: { fraction: 0.25 },
        y: { fromEnd: 150 },
      },
    },
  },

  card: {
    id: 'card',
    canvas: { kind: 'fromSymbol', margin: 200, widthRatio: 1.2, heightRatio: 1.6 },
    mode: 'rgba',
    fill: PALETTE.night,
    symbol: { dark: PALETTE.teal, light: PALETTE.white },
    background: [{ kind: 'gradient', color: PALETTE.cyan, attenuation: 0.05 }],
    placement: { kind: 'card', padding: 40, radius: 30, offsetY: 30, color: PALETTE.white },
    text: {
      title: { font: { file: 'CaviarDreams.fnt', size: 120 }, color: PALETTE.cyan, x: 'center', y: 80 },
      subtitle: { font: { file: 'CaviarDreams.fnt', size: 45 }, color: withAlpha(PALETTE.white, 220), x: 'center', y: 220 },
      footer: { font: { file: 'CaviarDreams.fnt', size: 35 }, color: withAlpha(PALETTE.cyan, 200), x: 'center', y: { fromEnd: 100 } },
    },
    sharpen: 1.3,
  },
};
