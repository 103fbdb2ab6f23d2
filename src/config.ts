import 'dotenv/config';

export const config = {
  outputDir: process.env.QR_OUTPUT_DIR || 'outputs',
  fontDir: process.env.QR_FONT_DIR || 'fonts',
  defaultDesign: process.env.QR_DEFAULT_DESIGN || 'card',
};

export function validateConfig(): void {
  if (!config.outputDir.trim()) {
    throw new Error('QR_OUTPUT_DIR must not be blank');
  }
  if (!config.fontDir.trim()) {
    throw new Error('QR_FONT_DIR must not be blank');
  }
}
