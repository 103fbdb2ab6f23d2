export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export function rgb(r: number, g: number, b: number, a: number = 255): Rgba {
  return { r, g, b, a };
}

/**
 * Format as "#rrggbbaa", the form the qrcode renderer accepts.
 */
export function toHex(color: Rgba): string {
  return '#' + [color.r, color.g, color.b, color.a]
    .map(c => c.toString(16).padStart(2, '0'))
    .join('');
}

export function withAlpha(color: Rgba, a: number): Rgba {
  return { ...color, a };
}

/**
 * Source-over blend of `src` onto the pixel at `idx` in an RGBA buffer.
 */
export function blendInto(data: Buffer, idx: number, src: Rgba): void {
  if (src.a <= 0) {
    return;
  }
  if (src.a >= 255) {
    data[idx] = src.r;
    data[idx + 1] = src.g;
    data[idx + 2] = src.b;
    data[idx + 3] = 255;
    return;
  }

  const dstA = data[idx + 3];
  if (dstA === 255) {
    // Opaque destination stays opaque
    const inv = 255 - src.a;
    data[idx] = Math.round((src.r * src.a + data[idx] * inv) / 255);
    data[idx + 1] = Math.round((src.g * src.a + data[idx + 1] * inv) / 255);
    data[idx + 2] = Math.round((src.b * src.a + data[idx + 2] * inv) / 255);
    return;
  }

  const sa = src.a / 255;
  const da = dstA / 255;
  const outA = sa + da * (1 - sa);
  const channel = (s: number, d: number): number =>
    Math.round((s * sa + d * da * (1 - sa)) / outA);

  data[idx] = channel(src.r, data[idx]);
  data[idx + 1] = channel(src.g, data[idx + 1]);
  data[idx + 2] = channel(src.b, data[idx + 2]);
  data[idx + 3] = Math.round(outA * 255);
}
