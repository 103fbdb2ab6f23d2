import { describe, it, expect } from 'vitest';
import Jimp from 'jimp';
import {
  assertFits,
  createCanvas,
  createRoundedMask,
  drawVerticalGradient,
  fillRect,
  paste,
  sharpen,
} from '../../src/canvas/compose.js';
import { rgb } from '../../src/canvas/color.js';
import { ValidationError } from '../../src/errors.js';
import { pixel } from '../helpers.js';

describe('createCanvas', () => {
  it('forces an opaque background in rgb mode', () => {
    const canvas = createCanvas(4, 3, rgb(10, 20, 30, 0), 'rgb');
    expect(canvas.image.bitmap.width).toBe(4);
    expect(canvas.image.bitmap.height).toBe(3);
    expect(pixel(canvas.image, 3, 2)).toEqual([10, 20, 30, 255]);
  });

  it('keeps background alpha in rgba mode', () => {
    const canvas = createCanvas(2, 2, rgb(10, 20, 30, 0), 'rgba');
    expect(pixel(canvas.image, 0, 0)).toEqual([10, 20, 30, 0]);
  });

  it('rejects empty sizes', () => {
    expect(() => createCanvas(0, 5, rgb(0, 0, 0), 'rgb')).toThrow(ValidationError);
  });
});

describe('fillRect', () => {
  it('paints later rectangles over earlier ones', () => {
    const canvas = createCanvas(10, 10, rgb(255, 255, 255), 'rgb');
    fillRect(canvas, { x: 0, y: 0, width: 10, height: 3 }, rgb(66, 133, 244));
    fillRect(canvas, { x: 0, y: 0, width: 3, height: 10 }, rgb(234, 67, 53));

    expect(pixel(canvas.image, 0, 0)).toEqual([234, 67, 53, 255]);
    expect(pixel(canvas.image, 5, 1)).toEqual([66, 133, 244, 255]);
    expect(pixel(canvas.image, 1, 5)).toEqual([234, 67, 53, 255]);
    expect(pixel(canvas.image, 5, 5)).toEqual([255, 255, 255, 255]);
  });

  it('clips rectangles that leave the canvas', () => {
    const canvas = createCanvas(10, 10, rgb(255, 255, 255), 'rgb');
    fillRect(canvas, { x: 8, y: 8, width: 5, height: 5 }, rgb(52, 168, 83));
    fillRect(canvas, { x: 20, y: 20, width: 5, height: 5 }, rgb(0, 0, 0));

    expect(pixel(canvas.image, 9, 9)).toEqual([52, 168, 83, 255]);
    expect(pixel(canvas.image, 7, 7)).toEqual([255, 255, 255, 255]);
  });
});

describe('drawVerticalGradient', () => {
  it('fades from the attenuated colour at the top to nothing at the bottom', () => {
    const canvas = createCanvas(20, 400, rgb(2, 4, 10), 'rgba');
    drawVerticalGradient(canvas, rgb(0, 230, 255), 0.05);

    expect(pixel(canvas.image, 5, 0)).toEqual([2, 15, 22, 255]);
    expect(pixel(canvas.image, 5, 399)).toEqual([2, 4, 10, 255]);
  });
});

describe('createRoundedMask', () => {
  it('cuts the corners at the given radius', () => {
    const mask = createRoundedMask(100, 100, 30);

    expect(pixel(mask, 0, 0)).toEqual([0, 0, 0, 255]);
    expect(pixel(mask, 99, 99)).toEqual([0, 0, 0, 255]);
    expect(pixel(mask, 50, 0)).toEqual([255, 255, 255, 255]);
    expect(pixel(mask, 0, 50)).toEqual([255, 255, 255, 255]);
    expect(pixel(mask, 50, 50)).toEqual([255, 255, 255, 255]);
  });
});

describe('paste', () => {
  it('copies an opaque source at the offset', () => {
    const canvas = createCanvas(10, 10, rgb(0, 0, 0), 'rgb');
    const source = new Jimp(2, 2, Jimp.rgbaToInt(255, 0, 0, 255));
    paste(canvas, source, 4, 4);

    expect(pixel(canvas.image, 4, 4)).toEqual([255, 0, 0, 255]);
    expect(pixel(canvas.image, 5, 5)).toEqual([255, 0, 0, 255]);
    expect(pixel(canvas.image, 6, 6)).toEqual([0, 0, 0, 255]);
  });

  it('uses the mask as the source alpha', () => {
    const canvas = createCanvas(100, 100, rgb(0, 0, 0), 'rgba');
    const card = new Jimp(100, 100, 0xffffffff);
    paste(canvas, card, 0, 0, createRoundedMask(100, 100, 30));

    expect(pixel(canvas.image, 0, 0)).toEqual([0, 0, 0, 255]);
    expect(pixel(canvas.image, 50, 50)).toEqual([255, 255, 255, 255]);
    // the source itself is not modified by masking
    expect(pixel(card, 0, 0)).toEqual([255, 255, 255, 255]);
  });
});

describe('assertFits', () => {
  it('accepts a block that touches the edges', () => {
    const canvas = createCanvas(10, 10, rgb(0, 0, 0), 'rgb');
    expect(() => assertFits(canvas, 10, 10, 0, 0)).not.toThrow();
  });

  it('rejects a block that would be clipped', () => {
    const canvas = createCanvas(10, 10, rgb(0, 0, 0), 'rgb');
    expect(() => assertFits(canvas, 11, 1, 0, 0)).toThrow(
      'A 11x1 block at (0, 0) does not fit in the 10x10 canvas'
    );
    expect(() => assertFits(canvas, 2, 2, -1, 0)).toThrow(ValidationError);
  });
});

describe('sharpen', () => {
  it('leaves flat regions unchanged', () => {
    const canvas = createCanvas(5, 5, rgb(40, 80, 120), 'rgb');
    sharpen(canvas, 1.3);
    expect(pixel(canvas.image, 2, 2)).toEqual([40, 80, 120, 255]);
    expect(pixel(canvas.image, 0, 4)).toEqual([40, 80, 120, 255]);
  });

  it('boosts an isolated bright pixel and clamps its neighbours', () => {
    const canvas = createCanvas(3, 3, rgb(0, 0, 0), 'rgb');
    fillRect(canvas, { x: 1, y: 1, width: 1, height: 1 }, rgb(100, 100, 100));
    sharpen(canvas, 1.3);

    expect(pixel(canvas.image, 1, 1)).toEqual([118, 118, 118, 255]);
    expect(pixel(canvas.image, 0, 0)).toEqual([0, 0, 0, 255]);
  });
});
