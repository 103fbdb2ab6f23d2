import path from 'path';
import { config } from './config.js';
import { canonicalDesignId, renderDesign } from './designs/index.js';
import { errorMessage, ValidationError } from './errors.js';
import { writePng } from './output/writer.js';
import { createQrRequest } from './qr/symbol.js';
import { loadConfigFile, mergeParams, type GenerateParams } from './settings.js';

export interface GenerateOptions extends GenerateParams {
  /** JSON configuration file; fills in anything not given explicitly */
  config?: string;
}

export interface ResolvedJob {
  url: string;
  design: string;
  output: string;
  title: string;
  subtitle: string;
  footer: string;
}

export function defaultOutputPath(design: string, outputDir: string = config.outputDir): string {
  return path.join(outputDir, `${canonicalDesignId(design)}_qr.png`);
}

/**
 * Merge explicit options over the config file over defaults and validate
 * the result. Nothing is rendered here.
 */
export function resolveJob(options: GenerateOptions, defaults: GenerateParams = {}): ResolvedJob {
  const fromFile = options.config ? loadConfigFile(options.config) : {};
  const params = mergeParams(options, fromFile, defaults, { design: config.defaultDesign });

  if (!params.url || !params.url.trim()) {
    throw new ValidationError('URL cannot be empty');
  }
  const design = params.design ?? config.defaultDesign;
  // Fails early on an unknown design
  canonicalDesignId(design);

  return {
    url: params.url,
    design,
    output: params.output ?? defaultOutputPath(design),
    title: params.title ?? '',
    subtitle: params.subtitle ?? '',
    footer: params.footer ?? '',
  };
}

export async function renderJob(job: ResolvedJob): Promise<string> {
  const request = createQrRequest(job.url);
  const canvas = await renderDesign(job.design, request, {
    title: job.title,
    subtitle: job.subtitle,
    footer: job.footer,
  });
  return writePng({ canvas, path: job.output });
}

/**
 * Generate one QR image and return the path it was written to.
 */
export async function generateQrCode(options: GenerateOptions): Promise<string> {
  try {
    const job = resolveJob(options);
    const outputPath = await renderJob(job);
    console.log(`✅ QR code generated: ${outputPath}`);
    return outputPath;
  } catch (error) {
    console.error(`Error generating QR code: ${errorMessage(error)}`);
    throw error;
  }
}

/**
 * Generate several images concurrently. Every job must resolve to its own
 * output path; duplicates are rejected before anything is rendered.
 */
export async function generateBatch(
  jobs: GenerateParams[],
  defaults: GenerateParams = {}
): Promise<string[]> {
  const resolved = jobs.map(job => resolveJob(job, defaults));

  const seen = new Set<string>();
  for (const job of resolved) {
    const key = path.resolve(job.output);
    if (seen.has(key)) {
      throw new ValidationError(`Duplicate output path in batch: ${job.output}`);
    }
    seen.add(key);
  }

  console.log(`[batch] Rendering ${resolved.length} QR codes`);
  const paths = await Promise.all(resolved.map(renderJob));
  console.log(`✅ Batch complete: ${paths.length} files written`);
  return paths;
}
