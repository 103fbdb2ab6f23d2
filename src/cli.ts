import { parseArgs } from 'util';
import { validateConfig } from './config.js';
import { SUPPORTED_DESIGNS } from './designs/index.js';
import { errorMessage, ValidationError } from './errors.js';
import { generateBatch, generateQrCode, resolveJob, type GenerateOptions } from './generator.js';
import { generateQRString } from './qr/symbol.js';
import { loadBatchFile, loadConfigFile, mergeParams } from './settings.js';

const USAGE = `Usage: qr-poster --url <url> [options]

Generate QR codes with decorated designs.

Options:
  --url <url>          URL to encode in the QR code
  --design <name>      Design style (${SUPPORTED_DESIGNS.join(', ')})
  --output <path>      Output PNG path (default: <QR_OUTPUT_DIR>/<design>_qr.png)
  --title <text>       Title text
  --subtitle <text>    Subtitle text
  --footer <text>      Footer text
  --config <path>      JSON configuration file; explicit options take precedence
  --batch <path>       JSON array of configurations to render together; other
                       options fill what an entry leaves unset
  --preview            Also print the QR code to the terminal
  -h, --help           Show this help`;

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      url: { type: 'string' },
      design: { type: 'string' },
      output: { type: 'string' },
      title: { type: 'string' },
      subtitle: { type: 'string' },
      footer: { type: 'string' },
      config: { type: 'string' },
      batch: { type: 'string' },
      preview: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  }).values;
}

/**
 * Run the command line and return the process exit status.
 */
export async function run(argv: string[]): Promise<number> {
  try {
    validateConfig();
    const args = parseCli(argv);

    if (args.help) {
      console.log(USAGE);
      return 0;
    }

    if (args.batch) {
      if (args.preview) {
        throw new ValidationError('--preview cannot be combined with --batch');
      }
      const jobs = loadBatchFile(args.batch);
      // Command-line values, then the config file, fill what each entry leaves unset
      const defaults = mergeParams(
        {
          url: args.url,
          design: args.design,
          output: args.output,
          title: args.title,
          subtitle: args.subtitle,
          footer: args.footer,
        },
        args.config ? loadConfigFile(args.config) : {}
      );
      const paths = await generateBatch(jobs, defaults);
      for (const outputPath of paths) {
        console.log(`QR code saved to: ${outputPath}`);
      }
      return 0;
    }

    const options: GenerateOptions = {
      url: args.url,
      design: args.design,
      output: args.output,
      title: args.title,
      subtitle: args.subtitle,
      footer: args.footer,
      config: args.config,
    };
    const outputPath = await generateQrCode(options);

    if (args.preview) {
      console.log(await generateQRString(resolveJob(options).url));
    }
    console.log(`QR code saved to: ${outputPath}`);
    return 0;
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }
}
