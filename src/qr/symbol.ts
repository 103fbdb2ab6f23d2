import QRCode from 'qrcode';
import Jimp from 'jimp';
import { ValidationError } from '../errors.js';
import { toHex, type Rgba } from '../canvas/color.js';

export type ErrorCorrectionLevel = 'L' | 'M' | 'Q' | 'H';

export interface QrRequest {
  readonly url: string;
  readonly errorCorrection: ErrorCorrectionLevel;
  /** Pixels per module */
  readonly cellSize: number;
  /** Quiet zone width in modules */
  readonly border: number;
}

export interface SymbolColors {
  dark: Rgba;
  light: Rgba;
}

export const DEFAULT_SYMBOL_OPTIONS = {
  errorCorrection: 'H',
  cellSize: 10,
  border: 2,
} as const satisfies Omit<QrRequest, 'url'>;

/**
 * Build an immutable QR request, rejecting blank URLs before anything is drawn.
 */
export function createQrRequest(
  url: string,
  options: Partial<Omit<QrRequest, 'url'>> = {}
): QrRequest {
  if (!url || !url.trim()) {
    throw new ValidationError('URL cannot be empty');
  }

  const request: QrRequest = {
    url,
    errorCorrection: options.errorCorrection ?? DEFAULT_SYMBOL_OPTIONS.errorCorrection,
    cellSize: options.cellSize ?? DEFAULT_SYMBOL_OPTIONS.cellSize,
    border: options.border ?? DEFAULT_SYMBOL_OPTIONS.border,
  };

  if (!Number.isInteger(request.cellSize) || request.cellSize < 1) {
    throw new ValidationError(`Cell size must be a positive integer, got ${request.cellSize}`);
  }
  if (!Number.isInteger(request.border) || request.border < 0) {
    throw new ValidationError(`Border must be a non-negative integer, got ${request.border}`);
  }

  return Object.freeze(request);
}

/**
 * Render the QR symbol as a PNG buffer, (modules + 2 * border) * cellSize pixels square.
 */
export async function generateQRBuffer(request: QrRequest, colors: SymbolColors): Promise<Buffer> {
  return QRCode.toBuffer(request.url, {
    errorCorrectionLevel: request.errorCorrection,
    type: 'png',
    scale: request.cellSize,
    margin: request.border,
    color: {
      dark: toHex(colors.dark),
      light: toHex(colors.light),
    },
  });
}

/**
 * Render the QR symbol into a raster image ready for compositing.
 */
export async function createQrSymbol(request: QrRequest, colors: SymbolColors): Promise<Jimp> {
  const png = await generateQRBuffer(request, colors);
  return Jimp.read(png);
}

/**
 * Generate a QR code as a string (terminal/ASCII)
 */
export async function generateQRString(url: string): Promise<string> {
  return QRCode.toString(url, {
    type: 'terminal',
    small: true,
  });
}
