import Jimp from 'jimp';
import {
  assertFits,
  canvasSize,
  createCanvas,
  createRoundedMask,
  drawVerticalGradient,
  fillRect,
  paste,
  sharpen,
  type Canvas,
} from '../canvas/compose.js';
import { createQrSymbol, type QrRequest } from '../qr/symbol.js';
import { createFontLoader } from '../text/fonts.js';
import { centeredX, renderText } from '../text/render.js';
import {
  TEXT_SLOTS,
  type BackgroundLayer,
  type CanvasSizing,
  type DesignLayout,
  type Offset,
  type SymbolPlacement,
  type TextFields,
} from './layouts.js';

export function resolveOffset(offset: Offset, extent: number): number {
  if (typeof offset === 'number') {
    return offset;
  }
  if ('fromEnd' in offset) {
    return extent - offset.fromEnd;
  }
  return Math.floor(extent * offset.fraction);
}

export function resolveCanvasSize(
  sizing: CanvasSizing,
  symbolSize: number
): { width: number; height: number } {
  if (sizing.kind === 'fixed') {
    return { width: sizing.size, height: sizing.size };
  }
  const base = symbolSize + sizing.margin;
  return {
    width: Math.floor(base * sizing.widthRatio),
    height: Math.floor(base * sizing.heightRatio),
  };
}

function drawBackground(canvas: Canvas, layer: BackgroundLayer): void {
  switch (layer.kind) {
    case 'rect': {
      const { width, height } = canvasSize(canvas);
      const x = Math.floor(width * layer.box.left);
      const y = Math.floor(height * layer.box.top);
      fillRect(
        canvas,
        {
          x,
          y,
          width: Math.floor(width * layer.box.right) - x,
          height: Math.floor(height * layer.box.bottom) - y,
        },
        layer.color
      );
      return;
    }
    case 'gradient':
      drawVerticalGradient(canvas, layer.color, layer.attenuation);
      return;
  }
}

function placeSymbol(canvas: Canvas, symbol: Jimp, placement: SymbolPlacement): void {
  const { width, height } = canvasSize(canvas);

  switch (placement.kind) {
    case 'scaled': {
      const size = Math.floor(Math.min(width, height) * placement.ratio);
      const scaled = symbol.clone().resize(size, size, Jimp.RESIZE_NEAREST_NEIGHBOR);
      const x = Math.floor((width - size) / 2);
      const y = Math.floor((height - size) / 2);
      assertFits(canvas, size, size, x, y);
      paste(canvas, scaled, x, y);
      return;
    }
    case 'card': {
      const symbolSize = symbol.bitmap.width;
      const cardSize = symbolSize + placement.padding;
      const x = Math.floor((width - cardSize) / 2);
      const y = Math.floor((height - cardSize) / 2) + placement.offsetY;
      assertFits(canvas, cardSize, cardSize, x, y);

      const { r, g, b, a } = placement.color;
      const card = new Jimp(cardSize, cardSize, Jimp.rgbaToInt(r, g, b, a));
      paste(canvas, card, x, y, createRoundedMask(cardSize, cardSize, placement.radius));

      const inset = Math.floor(placement.padding / 2);
      paste(canvas, symbol, x + inset, y + inset);
      return;
    }
  }
}

async function drawText(canvas: Canvas, layout: DesignLayout, texts: TextFields): Promise<void> {
  const { width, height } = canvasSize(canvas);
  const loadFont = createFontLoader();

  for (const slot of TEXT_SLOTS) {
    const text = texts[slot];
    if (!text) {
      continue;
    }
    const slotLayout = layout.text[slot];
    const font = await loadFont(slotLayout.font);
    const x = slotLayout.x === 'center'
      ? centeredX(width, font, text)
      : resolveOffset(slotLayout.x, width);
    const y = resolveOffset(slotLayout.y, height);
    renderText(canvas, text, { x, y }, font, slotLayout.color);
  }
}

/**
 * Compose one design: symbol, canvas, background layers in order,
 * symbol placement, text slots, then the optional sharpening pass.
 */
export async function composeDesign(
  layout: DesignLayout,
  request: QrRequest,
  texts: TextFields
): Promise<Canvas> {
  const symbol = await createQrSymbol(request, layout.symbol);
  const { width, height } = resolveCanvasSize(layout.canvas, symbol.bitmap.width);

  const canvas = createCanvas(width, height, layout.fill, layout.mode);
  for (const layer of layout.background) {
    drawBackground(canvas, layer);
  }
  placeSymbol(canvas, symbol, layout.placement);
  await drawText(canvas, layout, texts);

  if (layout.sharpen !== undefined) {
    sharpen(canvas, layout.sharpen);
  }
  return canvas;
}
